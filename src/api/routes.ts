import type { FastifyInstance } from "fastify";
import { LightCommandSchema } from "../core/command-schema.js";
import type { EventRouter } from "../core/event-router.js";
import {
  ActuatorDispatchError,
  ConfigurationError,
  InvalidCommandError,
  UnknownDeviceError,
  asErrorMessage,
} from "../errors.js";

export function statusForError(error: unknown): number {
  if (error instanceof UnknownDeviceError) return 404;
  if (error instanceof ConfigurationError || error instanceof InvalidCommandError) return 400;
  if (error instanceof ActuatorDispatchError) return 502;
  return 500;
}

export async function registerRoutes(
  app: FastifyInstance,
  deps: {
    router: EventRouter;
  },
): Promise<void> {
  app.get("/health", async () => ({ ok: true }));

  app.get("/api/lights", async () => deps.router.snapshots());

  app.get<{ Params: { id: string } }>("/api/lights/:id", async (request, reply) => {
    const { id } = request.params;
    if (!deps.router.has(id)) {
      reply.code(404);
      return { error: new UnknownDeviceError(id).message };
    }
    return deps.router.get(id).snapshot();
  });

  app.post<{ Params: { id: string }; Body: unknown }>("/api/lights/:id/set", async (request, reply) => {
    const parsed = LightCommandSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(400);
      return { error: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ") };
    }

    try {
      const outcome = await deps.router.route({
        kind: "command",
        deviceId: request.params.id,
        command: parsed.data,
      });
      return { actions: outcome.actions, state: outcome.report };
    } catch (error) {
      const status = statusForError(error);
      if (status >= 500) {
        request.log.warn({ deviceId: request.params.id, error: asErrorMessage(error) }, "Command failed");
      }
      reply.code(status);
      return { error: asErrorMessage(error) };
    }
  });
}
