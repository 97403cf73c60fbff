import path from "node:path";
import fs from "fs-extra";
import { z } from "zod";
import { DocsError } from "./errors.js";

const PageSchema = z
  .union([
    z.tuple([z.string().min(1), z.string().min(1)]),
    z.object({ label: z.string().min(1), path: z.string().min(1) }),
  ])
  .transform((page) =>
    Array.isArray(page) ? { label: page[0], path: page[1] } : page
  );

// JSON has no regular expressions, so they are written as { "pattern": "..." }
const IgnoreSchema = z.union([
  z.string(),
  z.instanceof(RegExp),
  z
    .object({ pattern: z.string(), flags: z.string().optional() })
    .transform(({ pattern, flags }) => new RegExp(pattern, flags)),
]);

export const SiteConfigSchema = z.object({
  sitename: z.string().min(1),
  authors: z.string().default(""),
  root: z.string().optional(),
  source: z.string().default("src"),
  build: z.string().default("build"),
  clean: z.boolean().default(true),
  pages: z.array(PageSchema).min(1),
  linkCheck: z.boolean().default(false),
  linkCheckIgnore: z.array(IgnoreSchema).default([]),
  linkCheckTimeout: z.number().int().positive().default(10_000),
  warnOnly: z.array(z.enum(["cross_references", "linkcheck"])).default([]),
  format: z
    .object({
      assets: z.array(z.string()).default([]),
      canonical: z.string().url().optional(),
    })
    .default({}),
  prepare: z
    .object({
      source: z.string(),
      destination: z.string(),
      header: z.string().optional(),
    })
    .optional(),
  deploy: z
    .object({
      repo: z.string().min(1),
      branch: z.string().default("gh-pages"),
      devBranch: z.string().default("main"),
    })
    .optional(),
});

export type SiteConfigInput = z.input<typeof SiteConfigSchema>;

/** A parsed config whose paths are all absolute */
export type SiteConfig = Omit<z.output<typeof SiteConfigSchema>, "root"> & {
  root: string;
};

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("\n");
}

/**
 * Validates a config and resolves every path in it against `root`,
 * which itself defaults to `base`.
 */
export function parseConfig(
  raw: unknown,
  { base = process.cwd() }: { base?: string } = {}
): SiteConfig {
  const result = SiteConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new DocsError(`Invalid docs config:\n${formatIssues(result.error)}`, {
      type: "invalid_config",
    });
  }

  const config = result.data;
  const root = path.resolve(base, config.root ?? ".");
  const resolve = (p: string) => path.resolve(root, p);

  return {
    ...config,
    root,
    source: resolve(config.source),
    build: resolve(config.build),
    prepare: config.prepare && {
      ...config.prepare,
      source: resolve(config.prepare.source),
      destination: resolve(config.prepare.destination),
    },
  };
}

/** Used by scripts that keep their config as a literal */
export function defineConfig(
  config: SiteConfigInput,
  opts?: { base?: string }
): SiteConfig {
  return parseConfig(config, opts);
}

/** Reads a JSON config file, resolving its paths against the file's directory */
export async function loadConfig(configPath: string): Promise<SiteConfig> {
  const absolute = path.resolve(configPath);
  let raw: unknown;
  try {
    raw = await fs.readJson(absolute);
  } catch (err) {
    throw new DocsError(`Unable to read docs config ${absolute}: ${err}`, {
      type: "invalid_config",
      cause: err,
    });
  }

  return parseConfig(raw, { base: path.dirname(absolute) });
}
