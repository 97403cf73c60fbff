import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, mock } from "node:test";
import fs from "fs-extra";

/** Creates temporary directories that are removed after each test */
export function setupTempDirs() {
  const dirs: Array<string> = [];

  afterEach(async () => {
    await Promise.all(dirs.splice(0).map((dir) => fs.remove(dir)));
  });

  const createTempDir = async (): Promise<string> => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "docs-builder-"));
    dirs.push(dir);
    return dir;
  };

  return { createTempDir };
}

/** Keeps logger output out of the test report */
export function silenceConsole() {
  beforeEach(() => {
    mock.method(console, "log", () => undefined);
    mock.method(console, "error", () => undefined);
    mock.method(console, "warn", () => undefined);
  });

  afterEach(() => {
    mock.restoreAll();
  });
}
