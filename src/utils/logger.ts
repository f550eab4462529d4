/**
 * Shared structured logger.
 */

import pino from "pino";

const logger = pino({
  name: "reportd",
  level: process.env.LOG_LEVEL || "info",
  base: { pid: process.pid },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export default logger;
