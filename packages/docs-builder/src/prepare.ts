import path from "node:path";
import fs from "fs-extra";
import { DocsError, NotFoundError } from "./errors.js";
import * as logger from "./logger.js";

export interface PrepareOptions {
  source: string;
  destination: string;
  // prepended verbatim, e.g. an `<!-- EditURL: ... -->` annotation
  header?: string;
}

/**
 * Copies `source` to `destination`, prepending `header` when one is given.
 * The destination is always overwritten in full.
 */
export async function prepare({
  source,
  destination,
  header,
}: PrepareOptions): Promise<void> {
  let content: string;
  try {
    content = await fs.readFile(source, "utf8");
  } catch (err) {
    throw new NotFoundError(source, { cause: err });
  }

  try {
    await fs.outputFile(destination, header ? header + content : content);
  } catch (err) {
    throw new DocsError(`Unable to write ${destination}: ${err}`, {
      type: "write_failed",
      cause: err,
    });
  }

  logger.item(
    `${path.relative(process.cwd(), source) || source} -> ${
      path.relative(process.cwd(), destination) || destination
    }`
  );
}
