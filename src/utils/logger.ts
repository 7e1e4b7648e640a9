import { pino } from "pino";
import type { LoggerOptions } from "pino";
import { env } from "./env.js";

const level =
  env.LOG_LEVEL ??
  (env.NODE_ENV === "production"
    ? "info"
    : env.NODE_ENV === "test"
      ? "silent"
      : "debug");

const options: LoggerOptions = {
  timestamp: () => `,"time":"${new Date().toJSON()}"`,
  level,
};

// Tests log nothing, so they skip the transport worker
const logger =
  env.NODE_ENV === "test"
    ? pino(options)
    : pino({
        ...options,
        transport: {
          targets: [
            // Console transport
            {
              target: "pino/file",
              options: {
                destination: 1, // stdout
              },
              level,
            },
          ],
        },
      });

export default logger;
