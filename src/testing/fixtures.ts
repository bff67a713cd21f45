import type { Actuator } from "../actuators/actuator.js";
import type { LightConfig, RuntimeConfig } from "../config/types.js";
import type { ActuatorAction, StateReport } from "../core/types.js";
import { ActuatorDispatchError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { StateOutput } from "../outputs/output.js";

/** Logger whose methods are mocks; `child` hands back the same instance. */
export function createTestLogger(): Logger {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}

export const LIVING_ROOM_BUCKETS = [
  { step: 0, minLux: 0, maxLux: 90 },
  { step: 1, minLux: 90, maxLux: 180 },
  { step: 2, minLux: 180, maxLux: 270 },
  { step: 3, minLux: 270, maxLux: 360 },
  { step: 4, minLux: 360, maxLux: 500 },
  { step: 5, minLux: 500, maxLux: 1500 },
] as const;

export function lightConfig(overrides: Partial<LightConfig> = {}): LightConfig {
  return {
    id: "living_room",
    name: "Living Room",
    sensorTopic: "sensors/living_room/lux",
    sensorValueKey: null,
    lightTopic: "ir-light-bridge/light/living_room",
    buckets: LIVING_ROOM_BUCKETS,
    maxStep: 5,
    defaultOnStep: 5,
    actions: {
      turnOn: "script.living_room_light_on",
      turnOff: "script.living_room_light_off",
      stepUp: "script.living_room_light_brighten",
      stepDown: "script.living_room_light_dim",
    },
    schedule: null,
    ...overrides,
  };
}

export function runtimeConfig(lights: readonly LightConfig[] = [lightConfig()]): RuntimeConfig {
  return {
    mqtt: {
      brokerUrl: "mqtt://broker.test:1883",
      baseTopic: "ir-light-bridge",
      discoveryPrefix: "homeassistant",
      discovery: true,
    },
    homeAssistant: {
      url: "http://ha.test:8123",
      token: "test-token",
      pressIntervalMs: 0,
      requestTimeoutMs: 1_000,
      dryRun: false,
    },
    scheduleCheckIntervalSeconds: 60,
    lights,
  };
}

/** Records every press; set `failAt` to reject the press with that index. */
export class RecordingActuator implements Actuator {
  readonly id = "recording";
  readonly sent: Array<{ deviceId: string; action: ActuatorAction }> = [];
  failAt: number | null = null;

  async dispatch(deviceId: string, action: ActuatorAction): Promise<void> {
    if (this.failAt !== null && this.sent.length === this.failAt) {
      throw new ActuatorDispatchError(deviceId, action, "remote unavailable", 503);
    }
    this.sent.push({ deviceId, action });
  }

  actions(): ActuatorAction[] {
    return this.sent.map((entry) => entry.action);
  }
}

export class RecordingOutput implements StateOutput {
  readonly id = "recording";
  readonly reports: StateReport[] = [];

  push(report: StateReport): void {
    this.reports.push(report);
  }
}

export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
