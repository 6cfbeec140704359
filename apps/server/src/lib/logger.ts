import pino from "pino";
import type { FastifyBaseLogger } from "fastify";

/** One root logger, shared by Fastify and the ledger operations. */
export type Logger = FastifyBaseLogger;

export function createLogger(level: string): Logger {
  return pino({ level, base: { service: "nation-ledger" } });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
