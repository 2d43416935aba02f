export { AssetFetcher, createObjectStoreClient, targetPathOf } from "./assets/assetFetcher.js";
export {
  applicationAsset,
  bundledCatalogPath,
  loadCatalog,
  parseCatalog,
  selectAssets,
  selectCatalogEntries,
  type AssetCatalog,
  type CatalogEntry
} from "./assets/catalog.js";
export { buildAuthorizedRequest, credentialStrategies, redactUrl } from "./assets/credentials.js";
export { CliGitClient, type GitClient } from "./assets/gitClient.js";
export { S3ObjectStoreClient, type ObjectStoreClient } from "./assets/objectStore.js";
export type { AssetDescriptor, FetchResult, FetchStatus } from "./assets/types.js";
export { ensureConfigTemplate, renderConfigTemplate } from "./config/configFile.js";
export { configSchema, loadEnv, parseConfig, type EffectiveConfig, type RawSettings } from "./config/env.js";
export { loadEffectiveConfig, resolveConfig, type ConfigLayers } from "./config/resolver.js";
export { checkConnectivity, checkDiskSpace, checkPorts, ensureWorkDir } from "./config/validation.js";
export { ProvisionError, type ProvisionErrorKind } from "./errors.js";
export { detectHostCapabilities, type HostCapabilities } from "./host/capabilities.js";
export { deriveRuntimeFlags, memoryLaunchFlag, memoryProfile, selectTorchIndex } from "./host/runtimeFlags.js";
export { createConsoleLogger, silentLogger, type Logger } from "./logging/logger.js";
export { provision, summarizeReport, type ProvisionReport } from "./provisioner.js";
export { TempFileRegistry, installSignalCleanup, signalExitCode } from "./runtime/cleanup.js";
export { installRuntime, planRuntimeInstall } from "./runtime/installer.js";
export {
  awaitReady,
  launchAndAwaitReady,
  stopService,
  superviseService,
  type ReadinessResult,
  type ServiceHandle
} from "./service/lifecycle.js";
export { createHttpLivenessProbe, livenessUrl, livenessUrlFromConfig } from "./service/liveness.js";
export { generateStartupScript, renderStartupScript } from "./service/startupScript.js";
export { bindDirectories, defaultBindingSpecs, type DirectoryBinding } from "./storage/directoryBinder.js";
