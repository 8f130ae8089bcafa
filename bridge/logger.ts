import { createLogger, format, transports, Logger } from "winston";

export const logger = createLogger({
  level: process.env.LOG_LEVEL || "info",
  // Jest sets NODE_ENV=test; keep test output clean
  silent: process.env.NODE_ENV === "test",
  format: format.combine(format.timestamp(), format.json()),
  defaultMeta: { service: "gud-bridge" },
  transports: [new transports.Console()],
});

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
