import os from "node:os";
import path from "node:path";
import fs from "fs-extra";
import git from "./git.js";
import * as logger from "./logger.js";
import type { DeployResult, SiteArtifact } from "./types.js";

const COMMITTER = [
  "-c",
  "user.name=docs-builder",
  "-c",
  "user.email=docs-builder@users.noreply.github.com",
];

export interface PublishOptions {
  // github.com/owner/name, or any url git can push to
  repo: string;
  branch: string;
  // deployments only happen from this branch
  devBranch?: string;
  // push even outside of CI or from another branch
  force?: boolean;
  // commit the site but do not push it
  dryRun?: boolean;
  message?: string;
  env?: NodeJS.ProcessEnv;
  // the checkout the docs were built from
  cwd?: string;
}

export type DeployDecision =
  | { deploy: true; branch?: string }
  | { deploy: false; reason: string };

/** github.com/owner/name -> https://github.com/owner/name.git */
export function remoteUrl(repo: string): string {
  if (
    repo.includes("://") ||
    repo.startsWith("git@") ||
    path.isAbsolute(repo)
  ) {
    return repo;
  }
  return `https://${repo.replace(/\.git$/, "")}.git`;
}

export async function shouldDeploy({
  devBranch = "main",
  force = false,
  env = process.env,
  cwd = process.cwd(),
}: Pick<PublishOptions, "devBranch" | "force" | "env" | "cwd">): Promise<
  DeployDecision
> {
  if (force) {
    return { deploy: true };
  }

  if (!env.CI) {
    return { deploy: false, reason: "not running in CI" };
  }

  if (env.GITHUB_EVENT_NAME === "pull_request") {
    return { deploy: false, reason: "pull request builds are not deployed" };
  }

  const branch = env.GITHUB_REF_NAME || (await git.currentBranch(cwd));
  if (branch !== devBranch) {
    const where = branch ? `branch "${branch}"` : "a detached HEAD";
    return {
      deploy: false,
      reason: `${where} is not the development branch "${devBranch}"`,
    };
  }

  return { deploy: true, branch };
}

/**
 * Pushes the built site to `branch` of `repo`, replacing whatever the branch
 * held before. The site is committed from a temporary repository that is
 * removed afterwards.
 */
export async function publish(
  site: SiteArtifact,
  opts: PublishOptions
): Promise<DeployResult> {
  const decision = await shouldDeploy(opts);
  if (!decision.deploy) {
    logger.info(`Skipping deployment: ${decision.reason}`);
    return { status: "skipped", reason: decision.reason };
  }

  const { repo, branch } = opts;
  const message = opts.message ?? `Build documentation for ${site.sitename}`;
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "docs-deploy-"));

  try {
    await fs.copy(site.root, dir);
    // serve the files as they are on GitHub Pages
    await fs.outputFile(path.join(dir, ".nojekyll"), "");

    await git.run(["init", "--quiet"], { cwd: dir });
    await git.run(["add", "--all"], { cwd: dir });
    await git.run([...COMMITTER, "commit", "--quiet", "-m", message], {
      cwd: dir,
    });
    const commit = await git.run(["rev-parse", "HEAD"], { cwd: dir });

    const push = [
      "push",
      "--quiet",
      "--force",
      remoteUrl(repo),
      `HEAD:refs/heads/${branch}`,
    ];
    if (opts.dryRun) {
      logger.info(`Dry run, not running: git ${push.join(" ")}`);
      return { status: "dry-run", repo, branch };
    }

    await git.run(push, { cwd: dir });
    logger.info(`Pushed ${commit.slice(0, 7)} to ${branch} of ${repo}`);
    return { status: "pushed", repo, branch, commit };
  } finally {
    await fs.remove(dir);
  }
}
