import type { LinkFailure } from "./types.js";

export type DocsErrorType =
  // prepare
  | "missing_source"
  | "write_failed"
  // configuration
  | "invalid_config"
  // build
  | "missing_page"
  | "missing_asset"
  | "linkcheck"
  | "cross_references"
  // default
  | "unknown";

export type DocsErrorOptions = {
  type?: DocsErrorType;
  cause?: unknown;
};

export class DocsError extends Error {
  public type: DocsErrorType;

  constructor(message: string, opts?: DocsErrorOptions) {
    super(message, { cause: opts?.cause });
    this.name = "DocsError";
    this.type = opts?.type ?? "unknown";
    Error.captureStackTrace(this, DocsError);
  }
}

export class NotFoundError extends DocsError {
  public path: string;

  constructor(path: string, opts?: { cause?: unknown }) {
    super(`Source file not found or not readable: ${path}`, {
      type: "missing_source",
      cause: opts?.cause,
    });
    this.name = "NotFoundError";
    this.path = path;
  }
}

const formatFailure = ({ url, page, reason }: LinkFailure) =>
  `  - ${url} (${page}): ${reason}`;

export class LinkCheckError extends DocsError {
  public failures: Array<LinkFailure>;

  constructor(failures: Array<LinkFailure>) {
    const plural = failures.length > 1;
    super(
      [
        `Found ${plural ? "these" : "a"} broken link${plural ? "s" : ""} in the docs:`,
        ...failures.map(formatFailure),
      ].join("\n"),
      {
        type: failures.some((failure) => failure.type === "linkcheck")
          ? "linkcheck"
          : "cross_references",
      }
    );
    this.name = "LinkCheckError";
    this.failures = failures;
  }
}
