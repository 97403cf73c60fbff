import path from "node:path";
import fs from "fs-extra";
import http, { type ProbeResult } from "../http.js";
import type { SiteConfig } from "../config.js";
import type { LinkFailure, PageEntry } from "../types.js";
import { setLink, type Document, type Link } from "./markdown.js";

/** These anchors exist on every page */
export const EXCLUDED_HASHES = ["top"];

const SCHEME = /^[a-z][a-z\d+.-]*:/i;
const EXTERNAL = /^https?:\/\//i;

export interface PageDocument {
  entry: PageEntry;
  /** posix path of the markdown file, relative to the docs source directory */
  path: string;
  /** posix path of the html file, relative to the build directory */
  output: string;
  doc: Document;
}

export type LinkCheckConfig = Pick<
  SiteConfig,
  "source" | "linkCheck" | "linkCheckIgnore" | "linkCheckTimeout"
>;

export const isExempt = (
  url: string,
  ignore: SiteConfig["linkCheckIgnore"]
): boolean =>
  ignore.some((pattern) => {
    if (typeof pattern === "string") {
      return pattern === url;
    }
    // a global or sticky pattern would otherwise resume from its last match
    pattern.lastIndex = 0;
    return pattern.test(url);
  });

const safeDecode = (value: string): string => {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
};

/** Checks if the hash links point to existing sections within the same page */
const validateHashLink = (page: PageDocument, link: Link): Array<LinkFailure> => {
  // non-ascii anchors arrive percent-encoded, slugs do not
  const hash = safeDecode(link.url.slice(1));
  if (EXCLUDED_HASHES.includes(hash) || page.doc.headings.includes(hash)) {
    return [];
  }

  return [
    {
      type: "cross_references",
      url: link.url,
      page: page.path,
      reason: `no heading "#${hash}" on this page`,
    },
  ];
};

/**
 * Checks a relative link against the pages of the site, or against the
 * files of the source directory, and points links to pages at their html.
 */
const validateRelativeLink = async (
  pages: Map<string, PageDocument>,
  config: LinkCheckConfig,
  page: PageDocument,
  link: Link
): Promise<Array<LinkFailure>> => {
  // guide/intro.md#heading -> ["guide/intro.md", "heading"]
  const [target, rawHash] = link.url.split("#", 2);
  const hash = rawHash && safeDecode(rawHash);
  const pathname = safeDecode(target.split("?", 1)[0]);
  const resolved = pathname.startsWith("/")
    ? path.posix.normalize(pathname.slice(1))
    : path.posix.join(path.posix.dirname(page.path), pathname);

  const failure = (reason: string): Array<LinkFailure> => [
    { type: "cross_references", url: link.url, page: page.path, reason },
  ];

  if (resolved === ".." || resolved.startsWith("../")) {
    return failure(`${resolved} is outside of the docs source directory`);
  }

  if (resolved.endsWith(".md")) {
    const foundPage = pages.get(resolved);
    if (!foundPage) {
      return failure(`${resolved} is not a page of the site`);
    }
    if (
      hash &&
      !EXCLUDED_HASHES.includes(hash) &&
      !foundPage.doc.headings.includes(hash)
    ) {
      return failure(`no heading "#${hash}" in ${resolved}`);
    }

    const relative = path.posix.relative(
      path.posix.dirname(page.output),
      foundPage.output
    );
    setLink(link, rawHash ? `${relative}#${rawHash}` : relative);
    return [];
  }

  if (!(await fs.pathExists(path.join(config.source, resolved)))) {
    return failure(`${resolved} does not exist`);
  }
  return [];
};

/**
 * Validates every link of every page. Internal links are always checked,
 * external ones only with `linkCheck`, and each external url is requested
 * once, one at a time.
 */
export async function validateLinks(
  pageDocuments: Array<PageDocument>,
  config: LinkCheckConfig
): Promise<Array<LinkFailure>> {
  const pages = new Map(pageDocuments.map((page) => [page.path, page]));
  const probed = new Map<string, ProbeResult>();
  const failures: Array<LinkFailure> = [];

  for (const page of pageDocuments) {
    for (const link of page.doc.links) {
      const { url } = link;

      if (url.startsWith("#")) {
        failures.push(...validateHashLink(page, link));
      } else if (EXTERNAL.test(url)) {
        if (!config.linkCheck || isExempt(url, config.linkCheckIgnore)) {
          continue;
        }
        let result = probed.get(url);
        if (!result) {
          result = await http.probe(url, { timeout: config.linkCheckTimeout });
          probed.set(url, result);
        }
        if (!result.ok) {
          failures.push({
            type: "linkcheck",
            url,
            page: page.path,
            reason: result.reason,
          });
        }
      } else if (!SCHEME.test(url) && !url.startsWith("//")) {
        failures.push(
          ...(await validateRelativeLink(pages, config, page, link))
        );
      }
    }
  }

  return failures;
}
