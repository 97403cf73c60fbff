export { prepare, type PrepareOptions } from "./prepare.js";
export { build, outputPathFor, type BuildConfig } from "./build/index.js";
export {
  publish,
  remoteUrl,
  shouldDeploy,
  type PublishOptions,
  type DeployDecision,
} from "./publish.js";
export {
  makedocs,
  type MakeDocsOptions,
  type MakeDocsResult,
} from "./pipeline.js";
export {
  defineConfig,
  loadConfig,
  parseConfig,
  SiteConfigSchema,
  type SiteConfig,
  type SiteConfigInput,
} from "./config.js";
export {
  DocsError,
  NotFoundError,
  LinkCheckError,
  type DocsErrorType,
} from "./errors.js";
export type {
  DeployResult,
  FailureKind,
  LinkFailure,
  PageEntry,
  RenderedPage,
  SiteArtifact,
  Stage,
} from "./types.js";
export * as logger from "./logger.js";
