import pino from "pino";

// stdout carries command output and the MCP stdio stream, so logs go to stderr.
const logger = pino(
  {
    name: "ncm-cli",
    level: process.env.NCM_LOG_LEVEL || "warn",
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2),
);

export function createLogger(module: string) {
  return logger.child({ module });
}
