import { UnknownDeviceError } from "../errors.js";
import type { SyncEngine } from "./sync-engine.js";
import type { CommandEvent, CommandOutcome, InboundEvent, LightSnapshot, SensorEvent, StateReport } from "./types.js";

/**
 * Hands each inbound event to the engine of the light it names. An unknown id
 * is a topic or settings mismatch and is raised, not dropped.
 */
export class EventRouter {
  private readonly engines = new Map<string, SyncEngine>();

  constructor(engines: Iterable<SyncEngine>) {
    for (const engine of engines) {
      this.engines.set(engine.deviceId, engine);
    }
  }

  route(event: SensorEvent): Promise<StateReport>;
  route(event: CommandEvent): Promise<CommandOutcome>;
  route(event: InboundEvent): Promise<StateReport | CommandOutcome>;
  async route(event: InboundEvent): Promise<StateReport | CommandOutcome> {
    const engine = this.get(event.deviceId);
    if (event.kind === "sensor") return engine.handleSensor(event.lux);
    return engine.handleCommand(event.command);
  }

  get(deviceId: string): SyncEngine {
    const engine = this.engines.get(deviceId);
    if (!engine) throw new UnknownDeviceError(deviceId);
    return engine;
  }

  has(deviceId: string): boolean {
    return this.engines.has(deviceId);
  }

  deviceIds(): string[] {
    return [...this.engines.keys()];
  }

  snapshots(): LightSnapshot[] {
    return [...this.engines.values()].map((engine) => engine.snapshot());
  }
}
