import { z } from "zod";
import { LightCommandSchema } from "../core/command-schema.js";
import type { StateReport } from "../core/types.js";
import type { Logger } from "../logger.js";
import { isDebugEnabled } from "../logger.js";
import type { StateOutput } from "../outputs/output.js";
import type { ClientEvent, ServerEvent } from "./protocol.js";

const ClientEventSchema = z.object({
  type: z.literal("command"),
  payload: z.object({
    deviceId: z.string().min(1),
    command: LightCommandSchema,
  }),
});

type EventHandler = (event: ClientEvent) => void;
export type WebSocketLike = {
  OPEN: number;
  readyState: number;
  send: (payload: string) => void;
  on: (event: "message" | "close", listener: (data: unknown) => void) => void;
};

export function parseClientEvent(raw: unknown): ClientEvent | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(String(raw));
  } catch {
    return null;
  }
  const result = ClientEventSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

/** Broadcasts state reports to every open WebSocket client. */
export class WsHub implements StateOutput {
  readonly id = "ws";
  private sockets = new Set<WebSocketLike>();
  private debug = isDebugEnabled();

  constructor(private readonly logger: Logger) {}

  get clientCount(): number {
    return this.sockets.size;
  }

  addClient(socket: WebSocketLike, onEvent: EventHandler): void {
    this.sockets.add(socket);
    if (this.debug) {
      this.logger.debug({ clients: this.sockets.size }, "WebSocket client added");
    }

    socket.on("message", (raw: unknown) => {
      const event = parseClientEvent(raw);
      if (!event) {
        this.logger.warn({ raw: String(raw) }, "Malformed WebSocket client event");
        return;
      }
      onEvent(event);
    });

    socket.on("close", () => {
      this.sockets.delete(socket);
      if (this.debug) {
        this.logger.debug({ clients: this.sockets.size }, "WebSocket client closed");
      }
    });
  }

  push(report: StateReport): void {
    this.broadcast({ type: "state", payload: report });
  }

  send(socket: WebSocketLike, event: ServerEvent): void {
    if (socket.readyState === socket.OPEN) {
      socket.send(JSON.stringify(event));
    }
  }

  broadcast(event: ServerEvent): void {
    const payload = JSON.stringify(event);
    for (const socket of this.sockets) {
      if (socket.readyState === socket.OPEN) {
        socket.send(payload);
      }
    }
  }
}
