/**
 * Configuration schema.
 */

import { z } from "zod";
import { join } from "path";
import { expandUser } from "../../utils/paths.js";
import { isValidTimeZone } from "../../utils/time.js";

export const SchedulerConfigSchema = z.object({
  enabled: z.boolean().default(true),
  /** Minutes between sweeps */
  intervalMinutes: z.number().positive().default(5),
  /** Time zone used to evaluate triggers and render file names */
  timezone: z
    .string()
    .default("UTC")
    .refine(isValidTimeZone, { message: "Unknown time zone" }),
  jobPollIntervalSeconds: z.number().positive().default(10),
  jobTimeoutSeconds: z.number().positive().default(300),
});

export const GraphConfigSchema = z.object({
  tenantId: z.string().default(""),
  clientId: z.string().default(""),
  clientSecret: z.string().default(""),
  baseUrl: z.string().url().default("https://graph.microsoft.com/beta"),
  scope: z.string().default("https://graph.microsoft.com/.default"),
});

export const StorageConfigSchema = z.object({
  /** Named storage configurations file; defaults to <dataDir>/storage-configs.json */
  configsFile: z.string().optional(),
});

export const NotificationsConfigSchema = z.object({
  globalWebhookUrl: z.string().default(""),
});

export const RpcConfigSchema = z.object({
  host: z.string().default("127.0.0.1"),
  port: z.number().int().min(0).max(65535).default(47321),
  /** When set, callers must send it in the x-reportd-token header */
  authToken: z.string().default(""),
});

export const ConfigSchema = z.object({
  dataDir: z.string().default("~/.reportd"),
  scheduler: SchedulerConfigSchema.default({}),
  graph: GraphConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
  notifications: NotificationsConfigSchema.default({}),
  rpc: RpcConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;
export type GraphConfig = z.infer<typeof GraphConfigSchema>;
export type RpcConfig = z.infer<typeof RpcConfigSchema>;

/**
 * Resolved data directory.
 */
export function getDataPath(config: Config): string {
  return expandUser(config.dataDir);
}

/**
 * Directory holding one definition file per report plus the index.
 */
export function getReportsPath(config: Config): string {
  return join(getDataPath(config), "scheduled-reports");
}

/**
 * Named storage configurations file.
 */
export function getStorageConfigsPath(config: Config): string {
  return config.storage.configsFile
    ? expandUser(config.storage.configsFile)
    : join(getDataPath(config), "storage-configs.json");
}
