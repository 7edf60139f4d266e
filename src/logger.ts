import pino, { Logger } from "pino";
import dotenv from "dotenv";

dotenv.config();

const env = process.env.NODE_ENV || "development";
const level =
  process.env.LOG_LEVEL || (env === "production" ? "info" : "debug");

// Logs go to stderr so command-line output on stdout stays machine-readable
export const logger = pino(
  { level, base: { service: "ip-enrich" } },
  pino.destination({ dest: 2, sync: true })
);

export type { Logger };

/**
 * Logger scoped to one component, e.g. `componentLogger("attribution")`
 */
export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
