#!/usr/bin/env node

import { readFileSync } from "node:fs";
import { Command, Option } from "commander";
import { z } from "zod";
import { build } from "./build/index.js";
import { loadConfig } from "./config.js";
import { DocsError } from "./errors.js";
import * as logger from "./logger.js";
import { makedocs } from "./pipeline.js";
import { prepare } from "./prepare.js";
import { publish } from "./publish.js";
import { reportError } from "./report.js";

const cliPkg = z
  .object({ name: z.string(), version: z.string() })
  .parse(
    JSON.parse(
      readFileSync(new URL("../package.json", import.meta.url), "utf8")
    )
  );

interface ConfigOptions {
  config: string;
}

interface DeployOptions extends ConfigOptions {
  dryRun: boolean;
  force: boolean;
}

interface MakeOptions extends DeployOptions {
  skipPublish: boolean;
}

const configOption = () =>
  new Option("-c, --config <path>", "Path to the JSON docs config")
    .makeOptionMandatory();

const dryRunOption = () =>
  new Option("--dry-run", "Commit the site but do not push it").default(false);

const forceOption = () =>
  new Option(
    "--force",
    "Deploy even outside of CI or from another branch"
  ).default(false);

const docsCli = new Command();

docsCli
  .name("docs-builder")
  .description("Build the style guide site and publish it to a git branch")
  .version(cliPkg.version, "-v, --version", "Output the current version")
  .helpOption("-h, --help", "Display help for command");

docsCli
  .command("make", { isDefault: true })
  .description("Prepare, build and publish the docs")
  .addOption(configOption())
  .addOption(
    new Option("--skip-publish", "Stop after the build").default(false)
  )
  .addOption(dryRunOption())
  .addOption(forceOption())
  .action(async (opts: MakeOptions) => {
    logger.hero("DOCS");
    const config = await loadConfig(opts.config);
    const { site, deploy } = await makedocs(config, opts);
    logger.log();
    logger.info(`Built ${site.pages.length} page(s) into ${site.root}`);
    if (deploy?.status === "pushed") {
      logger.info(`Published to ${deploy.branch} of ${deploy.repo}`);
    }
  });

docsCli
  .command("prepare")
  .description("Copy a source document into the docs source tree")
  .argument("<source>", "The document to copy")
  .argument("<destination>", "Where to write it")
  .option("--header <text>", "Text to put before the document")
  .action(
    async (source: string, destination: string, opts: { header?: string }) => {
      await prepare({ source, destination, header: opts.header });
    }
  );

docsCli
  .command("build")
  .description("Render the pages and check their links")
  .addOption(configOption())
  .action(async (opts: ConfigOptions) => {
    const config = await loadConfig(opts.config);
    const site = await build(config);
    logger.info(`Built ${site.pages.length} page(s) into ${site.root}`);
  });

docsCli
  .command("deploy")
  .description("Build the docs and push them to the deploy branch")
  .addOption(configOption())
  .addOption(dryRunOption())
  .addOption(forceOption())
  .action(async (opts: DeployOptions) => {
    const config = await loadConfig(opts.config);
    if (!config.deploy) {
      throw new DocsError(`No "deploy" section in ${opts.config}`, {
        type: "invalid_config",
      });
    }
    const site = await build(config);
    await publish(site, {
      ...config.deploy,
      dryRun: opts.dryRun,
      force: opts.force,
      cwd: config.root,
    });
  });

docsCli.parseAsync().catch((error: unknown) => {
  reportError(error);
  process.exit(1);
});
