#!/usr/bin/env node
/**
 * reportd - scheduled report execution service.
 *
 * Runs due report exports, stores the results in blob storage, and notifies
 * a webhook. Front ends talk to it over a loopback RPC server.
 */

import { createProgram } from "./cli/commands.js";
import { errorMessage } from "./core/errors.js";
import logger from "./utils/logger.js";

const program = createProgram();
program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error({ error: errorMessage(error) }, "Command failed");
  process.exitCode = 1;
});
