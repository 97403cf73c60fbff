import path from "node:path";
import { h } from "hastscript";
import { toHtml } from "hast-util-to-html";
import type { Element, Root } from "hast";

export interface SiteLayout {
  sitename: string;
  authors: string;
  /** every page of the site, in navigation order */
  pages: Array<{ label: string; output: string }>;
  /** asset paths relative to the build directory */
  assets: Array<string>;
  canonical?: string;
}

export interface PageContent {
  label: string;
  output: string;
  tree: Root;
  description?: string;
  editUrl?: string;
}

const ICONS = [".ico", ".png", ".svg"];

const assetElement = (asset: string, href: string): Element | undefined => {
  const extension = path.posix.extname(asset).toLowerCase();
  if (ICONS.includes(extension)) {
    return h("link", { rel: "icon", href });
  }
  if (extension === ".css") {
    return h("link", { rel: "stylesheet", href });
  }
  if (extension === ".js") {
    return h("script", { src: href, defer: true });
  }
  return undefined;
};

export const canonicalUrl = (base: string, output: string): string => {
  const withSlash = base.endsWith("/") ? base : `${base}/`;
  return new URL(output === "index.html" ? "" : output, withSlash).href;
};

/** Renders one page into a complete html document */
export function renderPage(page: PageContent, site: SiteLayout): string {
  // every url in the document is relative to the page itself
  const relative = (to: string) =>
    path.posix.relative(path.posix.dirname(page.output), to);
  const title =
    page.label === site.sitename
      ? site.sitename
      : `${page.label} · ${site.sitename}`;
  const home = site.pages[0]?.output ?? "index.html";

  const head = h("head", [
    h("meta", { charSet: "utf-8" }),
    h("meta", {
      name: "viewport",
      content: "width=device-width, initial-scale=1",
    }),
    h("title", title),
    page.description
      ? h("meta", { name: "description", content: page.description })
      : null,
    site.authors ? h("meta", { name: "author", content: site.authors }) : null,
    site.canonical
      ? h("link", {
          rel: "canonical",
          href: canonicalUrl(site.canonical, page.output),
        })
      : null,
    ...site.assets.map((asset) => assetElement(asset, relative(asset))),
  ]);

  const nav = h(
    "nav",
    h(
      "ul",
      site.pages.map((entry) =>
        h(
          "li",
          h(
            "a",
            {
              href: relative(entry.output),
              "aria-current": entry.output === page.output ? "page" : undefined,
            },
            entry.label
          )
        )
      )
    )
  );

  const body = h("body", [
    h("header", h("a", { href: relative(home) }, site.sitename)),
    nav,
    h("main", page.tree.children),
    h("footer", [
      page.editUrl ? h("a", { href: page.editUrl }, "Edit on GitHub") : null,
      site.authors ? h("p", `Written by ${site.authors}`) : null,
    ]),
  ]);

  const document: Root = {
    type: "root",
    children: [{ type: "doctype" }, h("html", { lang: "en" }, [head, body])],
  };

  return `${toHtml(document)}\n`;
}
