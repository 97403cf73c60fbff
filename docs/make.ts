import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig, logger, makedocs } from "@style-guide/docs-builder";

const docsDir = path.dirname(fileURLToPath(import.meta.url));

const config = defineConfig(
  {
    sitename: "Style Guide",
    authors: "The style guide maintainers",
    prepare: {
      source: "../README.md",
      destination: "src/index.md",
      header:
        "<!-- EditURL: https://github.com/example/style-guide/blob/main/README.md -->\n",
    },
    clean: true,
    linkCheck: true,
    // anchors in the guide point at headings of the rendered README
    warnOnly: ["cross_references"],
    format: {
      assets: ["assets/favicon.svg"],
      canonical: "https://example.github.io/style-guide/",
    },
    pages: [["Style Guide", "index.md"]],
    deploy: {
      repo: "github.com/example/style-guide",
      devBranch: "main",
    },
  },
  { base: docsDir }
);

try {
  await makedocs(config, {
    skipPublish: process.argv.includes("--skip-publish"),
  });
} catch (err) {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
}
