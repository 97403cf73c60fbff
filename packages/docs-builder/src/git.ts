import { execa } from "execa";

async function run(
  args: Array<string>,
  { cwd }: { cwd: string }
): Promise<string> {
  const { stdout } = await execa("git", args, { cwd });
  return stdout.trim();
}

/** The branch checked out in `cwd`, or undefined outside of a repository */
async function currentBranch(cwd: string): Promise<string | undefined> {
  try {
    const branch = await run(["rev-parse", "--abbrev-ref", "HEAD"], { cwd });
    return branch === "HEAD" ? undefined : branch;
  } catch {
    return undefined;
  }
}

// Exported as an object instead of export keyword, so that these functions
// can be mocked in tests.
export default {
  run,
  currentBranch,
};
