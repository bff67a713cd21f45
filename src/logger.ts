import type { FastifyBaseLogger } from "fastify";

/**
 * The slice of Fastify's pino logger the service passes around. `app.log` and
 * its children satisfy it directly.
 */
export type Logger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error"> & {
  child(bindings: Record<string, unknown>): Logger;
};

export function isDebugEnabled(): boolean {
  return process.env.IR_BRIDGE_DEBUG === "1";
}
