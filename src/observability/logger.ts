import pino from "pino";
import { resolveLogLevel } from "../config/env.js";

// Resolving the level loads .env, so NODE_ENV below sees it too
const level = resolveLogLevel();
const isDev = process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";

export const logger = pino(
  { level },
  isDev
    ? pino.transport({
        target: "pino-pretty",
        options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname" }
      })
    : undefined
);
