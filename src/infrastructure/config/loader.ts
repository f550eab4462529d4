/**
 * Configuration loading and persistence.
 */

import { existsSync, readFileSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import { homedir } from "os";
import { ConfigSchema, getDataPath, type Config } from "./schema.js";
import { ensureDir, expandUser } from "../../utils/paths.js";
import { isRecord } from "../../utils/guards.js";
import logger from "../../utils/logger.js";

type Env = Record<string, string | undefined>;

/**
 * Path of the configuration file.
 */
export function getConfigPath(env: Env = process.env): string {
  if (env.REPORTD_CONFIG) {
    return expandUser(env.REPORTD_CONFIG);
  }
  return join(homedir(), ".reportd", "config.json");
}

/**
 * Data directory for a loaded configuration, created if missing.
 */
export function getDataDir(config: Config): string {
  return ensureDir(getDataPath(config));
}

function parsePort(value: string): number | undefined {
  const port = Number.parseInt(value, 10);
  return Number.isInteger(port) && port >= 0 && port <= 65535 ? port : undefined;
}

/**
 * Apply REPORTD_* environment variables on top of a raw config object.
 */
export function applyEnvOverrides(raw: Record<string, unknown>, env: Env = process.env): Record<string, unknown> {
  const section = (key: string): Record<string, unknown> => {
    const value = raw[key];
    return isRecord(value) ? { ...value } : {};
  };

  const result: Record<string, unknown> = { ...raw };
  const scheduler = section("scheduler");
  const graph = section("graph");
  const notifications = section("notifications");
  const rpc = section("rpc");

  if (env.REPORTD_DATA_DIR) result.dataDir = env.REPORTD_DATA_DIR;
  if (env.REPORTD_TIMEZONE) scheduler.timezone = env.REPORTD_TIMEZONE;
  if (env.REPORTD_GRAPH_TENANT_ID) graph.tenantId = env.REPORTD_GRAPH_TENANT_ID;
  if (env.REPORTD_GRAPH_CLIENT_ID) graph.clientId = env.REPORTD_GRAPH_CLIENT_ID;
  if (env.REPORTD_GRAPH_CLIENT_SECRET) graph.clientSecret = env.REPORTD_GRAPH_CLIENT_SECRET;
  if (env.REPORTD_WEBHOOK_URL) notifications.globalWebhookUrl = env.REPORTD_WEBHOOK_URL;
  if (env.REPORTD_RPC_TOKEN) rpc.authToken = env.REPORTD_RPC_TOKEN;
  if (env.REPORTD_RPC_PORT) {
    const port = parsePort(env.REPORTD_RPC_PORT);
    if (port !== undefined) {
      rpc.port = port;
    } else {
      logger.warn({ value: env.REPORTD_RPC_PORT }, "Ignoring invalid REPORTD_RPC_PORT");
    }
  }

  result.scheduler = scheduler;
  result.graph = graph;
  result.notifications = notifications;
  result.rpc = rpc;
  return result;
}

/**
 * Load configuration from disk, falling back to defaults.
 *
 * A malformed file is logged and ignored; invalid values after overrides throw.
 */
export function loadConfig(configPath: string = getConfigPath(), env: Env = process.env): Config {
  let raw: Record<string, unknown> = {};

  if (existsSync(configPath)) {
    try {
      const data: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
      if (isRecord(data)) {
        raw = data;
      } else {
        logger.warn({ configPath }, "Config file is not a JSON object, using defaults");
      }
    } catch (error) {
      logger.warn({ error, configPath }, "Failed to read config file, using defaults");
    }
  }

  return ConfigSchema.parse(applyEnvOverrides(raw, env));
}

/**
 * Write configuration to disk.
 */
export function saveConfig(config: Config, configPath: string = getConfigPath()): void {
  ensureDir(dirname(configPath));
  writeFileSync(configPath, JSON.stringify(config, null, 2));
}
