export type FailureKind = "cross_references" | "linkcheck";

export interface LinkFailure {
  type: FailureKind;
  /** the href or src as written in the page */
  url: string;
  /** the page the link was found on, relative to the docs source directory */
  page: string;
  reason: string;
}

export interface PageEntry {
  label: string;
  path: string;
}

export interface RenderedPage {
  label: string;
  /** the document title, always the label of the page entry */
  title: string;
  /** absolute path of the markdown file */
  source: string;
  /** path of the html file, relative to the build directory */
  output: string;
  /** slugs of every heading, in document order */
  headings: Array<string>;
  /** rendered markdown, without the surrounding document */
  body: string;
  /** the complete html document */
  html: string;
  editUrl?: string;
}

export interface SiteArtifact {
  /** absolute path of the build directory */
  root: string;
  sitename: string;
  pages: Array<RenderedPage>;
  /** asset paths, relative to the build directory */
  assets: Array<string>;
}

export type DeployResult =
  | { status: "pushed"; repo: string; branch: string; commit: string }
  | { status: "dry-run"; repo: string; branch: string }
  | { status: "skipped"; reason: string };

export type Stage = "idle" | "prepared" | "built" | "published";
