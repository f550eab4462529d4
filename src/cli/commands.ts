/**
 * Command line interface.
 */

import { existsSync } from "fs";
import { Command } from "commander";
import {
  ConfigSchema,
  getConfigPath,
  getReportsPath,
  loadConfig,
  saveConfig,
  startRpcServer,
} from "../infrastructure/index.js";
import { ensureDir } from "../utils/paths.js";
import { errorMessage } from "../core/errors.js";
import { createRuntime } from "./runtime.js";
import logger from "../utils/logger.js";

type GlobalOptions = {
  config?: string;
};

function configPathFrom(command: Command): string {
  const options: GlobalOptions = command.optsWithGlobals();
  return options.config ?? getConfigPath();
}

async function commandInit(configPath: string): Promise<void> {
  if (existsSync(configPath)) {
    console.log(`Config already exists at ${configPath}`);
    return;
  }

  const config = ConfigSchema.parse({});
  saveConfig(config, configPath);
  ensureDir(getReportsPath(config));
  console.log(`Created config at ${configPath}`);
}

async function commandServe(configPath: string): Promise<void> {
  const runtime = createRuntime(loadConfig(configPath));
  const { config, scheduler, server, service } = runtime;

  if (config.scheduler.enabled) {
    await scheduler.start();
  } else {
    logger.warn("Scheduler disabled by configuration; only RPC calls will run reports");
  }
  await startRpcServer(server, config.rpc.host, config.rpc.port);

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutting down");
    scheduler.stop();
    service.close();
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ error: errorMessage(error) }, "Error while closing RPC server");
        process.exit(1);
      },
    );
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

async function commandSweep(configPath: string): Promise<void> {
  const { coordinator } = createRuntime(loadConfig(configPath));
  const summary = await coordinator.sweep();
  console.log(JSON.stringify(summary, null, 2));
  if (summary.error || summary.failedExecutions > 0) {
    process.exitCode = 1;
  }
}

async function commandStatus(configPath: string): Promise<void> {
  const { config, coordinator } = createRuntime(loadConfig(configPath));
  const status = await coordinator.status({
    enabled: config.scheduler.enabled,
    intervalMinutes: config.scheduler.intervalMinutes,
  });
  console.log(JSON.stringify(status, null, 2));
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("reportd")
    .description("Scheduled device-management report execution service.")
    .version("0.1.0")
    .option("-c, --config <path>", "Configuration file (default: ~/.reportd/config.json)");

  program
    .command("init")
    .description("Write a default configuration file and create the data directory.")
    .action(async (_options: unknown, command: Command) => {
      await commandInit(configPathFrom(command));
    });

  program
    .command("serve")
    .description("Run the periodic scheduler and the loopback RPC server.")
    .action(async (_options: unknown, command: Command) => {
      await commandServe(configPathFrom(command));
    });

  program
    .command("sweep")
    .description("Run one sweep over the stored reports and print its summary.")
    .action(async (_options: unknown, command: Command) => {
      await commandSweep(configPathFrom(command));
    });

  program
    .command("status")
    .description("Print report counts and the next due time.")
    .action(async (_options: unknown, command: Command) => {
      await commandStatus(configPathFrom(command));
    });

  return program;
}
