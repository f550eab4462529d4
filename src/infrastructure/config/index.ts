/**
 * Config infrastructure exports.
 */

export {
  ConfigSchema,
  SchedulerConfigSchema,
  GraphConfigSchema,
  StorageConfigSchema,
  NotificationsConfigSchema,
  RpcConfigSchema,
  getDataPath,
  getReportsPath,
  getStorageConfigsPath,
  type Config,
  type SchedulerConfig,
  type GraphConfig,
  type RpcConfig,
} from "./schema.js";

export {
  loadConfig,
  saveConfig,
  getConfigPath,
  getDataDir,
  applyEnvOverrides,
} from "./loader.js";
