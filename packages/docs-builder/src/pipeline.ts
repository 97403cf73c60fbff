import { build } from "./build/index.js";
import type { SiteConfig } from "./config.js";
import { prepare } from "./prepare.js";
import { publish } from "./publish.js";
import * as logger from "./logger.js";
import type { DeployResult, SiteArtifact, Stage } from "./types.js";

export interface MakeDocsOptions {
  skipPublish?: boolean;
  dryRun?: boolean;
  force?: boolean;
  env?: NodeJS.ProcessEnv;
  // notified after every completed stage
  onStage?: (stage: Stage) => void;
}

export interface MakeDocsResult {
  site: SiteArtifact;
  deploy?: DeployResult;
}

/**
 * Runs prepare, build and publish in order. The first failing stage stops
 * the run; its error is logged with the stage name and rethrown as is.
 */
export async function makedocs(
  config: SiteConfig,
  opts: MakeDocsOptions = {}
): Promise<MakeDocsResult> {
  let running: "prepare" | "build" | "publish" = "prepare";

  try {
    logger.step(1, "Prepare");
    if (config.prepare) {
      await prepare(config.prepare);
    } else {
      logger.dimmed("  nothing to prepare");
    }
    opts.onStage?.("prepared");
    running = "build";

    logger.step(2, "Build");
    const site = await build(config);
    opts.onStage?.("built");
    running = "publish";

    logger.step(3, "Publish");
    let deploy: DeployResult | undefined;
    if (!config.deploy) {
      logger.dimmed("  no deploy target configured");
    } else if (opts.skipPublish) {
      logger.dimmed("  publishing skipped");
    } else {
      deploy = await publish(site, {
        ...config.deploy,
        dryRun: opts.dryRun,
        force: opts.force,
        env: opts.env,
        cwd: config.root,
      });
    }
    opts.onStage?.("published");
    opts.onStage?.("idle");

    return { site, deploy };
  } catch (err) {
    logger.error(`The ${running} stage failed`);
    throw err;
  }
}
