import pino from "pino";
import { LOG_LEVEL } from "./config.js";

/**
 * Logging capability handed to services. Both Fastify's request/app loggers
 * and the CLI's pino instance satisfy it.
 */
export type Logger = pino.BaseLogger;

/** pino logger for CLI and batch entry points (the web app uses Fastify's). */
export function createLogger(name: string, level: string = LOG_LEVEL): pino.Logger {
  return pino({ name, level });
}
