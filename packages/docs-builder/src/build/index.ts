import path from "node:path";
import fs from "fs-extra";
import { toHtml } from "hast-util-to-html";
import type { SiteConfig } from "../config.js";
import { DocsError, LinkCheckError } from "../errors.js";
import * as logger from "../logger.js";
import type {
  LinkFailure,
  PageEntry,
  RenderedPage,
  SiteArtifact,
} from "../types.js";
import { validateLinks, type PageDocument } from "./links.js";
import { parseMarkdown } from "./markdown.js";
import { renderPage, type SiteLayout } from "./template.js";

export type BuildConfig = Pick<
  SiteConfig,
  | "sitename"
  | "authors"
  | "source"
  | "build"
  | "clean"
  | "pages"
  | "linkCheck"
  | "linkCheckIgnore"
  | "linkCheckTimeout"
  | "warnOnly"
  | "format"
>;

const toPosix = (p: string) => p.split(path.sep).join(path.posix.sep);

/** index.md -> index.html, guide/style.md -> guide/style.html */
export const outputPathFor = (page: string): string =>
  page.replace(/\.md$/, "") + ".html";

const readPage = async (
  source: string,
  entry: PageEntry
): Promise<PageDocument> => {
  const absolute = path.resolve(source, entry.path);
  const relative = toPosix(path.relative(source, absolute));
  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new DocsError(
      `Page "${entry.label}" (${entry.path}) is outside of the docs source directory ${source}`,
      { type: "invalid_config" }
    );
  }

  let markdown: string;
  try {
    markdown = await fs.readFile(absolute, "utf8");
  } catch (err) {
    throw new DocsError(`Page "${entry.label}" not found: ${absolute}`, {
      type: "missing_page",
      cause: err,
    });
  }

  return {
    entry,
    path: relative,
    output: outputPathFor(relative),
    doc: await parseMarkdown(markdown),
  };
};

/** Logs failures that are only warnings, and throws for the rest */
const reportFailures = (
  failures: Array<LinkFailure>,
  warnOnly: BuildConfig["warnOnly"]
) => {
  const fatal: Array<LinkFailure> = [];
  for (const failure of failures) {
    if (warnOnly.includes(failure.type)) {
      logger.warn(
        `${failure.type}: ${failure.url} (${failure.page}): ${failure.reason}`
      );
    } else {
      fatal.push(failure);
    }
  }

  if (fatal.length > 0) {
    throw new LinkCheckError(fatal);
  }
};

/** Checks the configured assets and returns their paths within the source */
const resolveAssets = async (config: BuildConfig): Promise<Array<string>> => {
  const assets: Array<string> = [];
  for (const asset of config.format.assets) {
    const from = path.resolve(config.source, asset);
    const relative = toPosix(path.relative(config.source, from));
    if (relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new DocsError(
        `Asset ${asset} is outside of the docs source directory ${config.source}`,
        { type: "invalid_config" }
      );
    }
    if (!(await fs.pathExists(from))) {
      throw new DocsError(`Asset not found: ${from}`, {
        type: "missing_asset",
      });
    }
    assets.push(relative);
  }
  return assets;
};

/** Copies every file of the source directory except the markdown */
const copySourceFiles = async (config: BuildConfig): Promise<void> => {
  const walk = async (dir: string): Promise<void> => {
    for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
      const from = path.join(dir, entry.name);
      if (from === config.build) {
        continue;
      }
      if (entry.isDirectory()) {
        await walk(from);
      } else if (path.extname(entry.name) !== ".md") {
        await fs.copy(
          from,
          path.join(config.build, path.relative(config.source, from))
        );
      }
    }
  };

  await walk(config.source);
};

/**
 * Renders every page of the site, validates its links and writes the
 * result to the build directory, along with every other file of the source
 * directory. Nothing is written when a link or an asset fails its check.
 */
export async function build(config: BuildConfig): Promise<SiteArtifact> {
  const plural = config.pages.length === 1 ? "" : "s";
  const loader = logger.docsLoader(
    `Rendering ${config.pages.length} page${plural}...`
  );
  loader.start();

  const pages: Array<PageDocument> = [];
  let failures: Array<LinkFailure> = [];
  try {
    for (const entry of config.pages) {
      pages.push(await readPage(config.source, entry));
    }
    loader.text = config.linkCheck
      ? "Checking internal and external links..."
      : "Checking internal links...";
    failures = await validateLinks(pages, config);
  } finally {
    loader.stop();
  }

  reportFailures(failures, config.warnOnly);
  const assets = await resolveAssets(config);

  if (config.clean) {
    await fs.remove(config.build);
  }
  await copySourceFiles(config);

  const layout: SiteLayout = {
    sitename: config.sitename,
    authors: config.authors,
    pages: pages.map((page) => ({
      label: page.entry.label,
      output: page.output,
    })),
    assets,
    canonical: config.format.canonical,
  };

  const rendered: Array<RenderedPage> = [];
  for (const page of pages) {
    const html = renderPage(
      {
        label: page.entry.label,
        output: page.output,
        tree: page.doc.tree,
        description: page.doc.frontMatter.description,
        editUrl: page.doc.editUrl,
      },
      layout
    );
    await fs.outputFile(path.join(config.build, page.output), html);
    logger.item(page.output);

    rendered.push({
      label: page.entry.label,
      title: page.entry.label,
      source: path.join(config.source, page.path),
      output: page.output,
      headings: page.doc.headings,
      body: toHtml(page.doc.tree),
      html,
      editUrl: page.doc.editUrl,
    });
  }

  return {
    root: config.build,
    sitename: config.sitename,
    pages: rendered,
    assets,
  };
}
