import { setTimeout as delay } from "node:timers/promises";
import type { ActionScripts, LightConfig } from "../config/types.js";
import type { ActuatorAction } from "../core/types.js";
import { ActuatorDispatchError, UnknownDeviceError, asErrorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { Actuator } from "./actuator.js";

const SCRIPT_KEY: Record<ActuatorAction, keyof ActionScripts> = {
  turn_on: "turnOn",
  turn_off: "turnOff",
  step_up: "stepUp",
  step_down: "stepDown",
};

export interface HomeAssistantActuatorOptions {
  baseUrl: string;
  token: string;
  lights: readonly LightConfig[];
  /** Pause after every call so the IR blaster can keep up with repeated presses. */
  pressIntervalMs: number;
  /** Aborts a service call that has not answered within this many milliseconds. */
  requestTimeoutMs: number;
  logger: Logger;
  fetchImpl?: typeof fetch;
}

/**
 * Presses remote buttons by running the Home Assistant script configured for
 * each action (`script.turn_on` with the script's entity id).
 */
export class HomeAssistantActuator implements Actuator {
  readonly id = "home-assistant";
  private readonly baseUrl: string;
  private readonly scriptsByDevice = new Map<string, Readonly<ActionScripts>>();
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HomeAssistantActuatorOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.fetchImpl = options.fetchImpl ?? fetch;
    for (const light of options.lights) {
      this.scriptsByDevice.set(light.id, light.actions);
    }
  }

  async dispatch(deviceId: string, action: ActuatorAction): Promise<void> {
    const scripts = this.scriptsByDevice.get(deviceId);
    if (!scripts) throw new UnknownDeviceError(deviceId);
    const entityId = scripts[SCRIPT_KEY[action]];

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/api/services/script/turn_on`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.options.token}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ entity_id: entityId }),
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
      });
    } catch (error) {
      throw new ActuatorDispatchError(deviceId, action, `${entityId} unreachable: ${asErrorMessage(error)}`);
    }

    if (!response.ok) {
      const body = await response.text();
      throw new ActuatorDispatchError(
        deviceId,
        action,
        `${entityId} failed: ${response.status} ${body}`,
        response.status,
      );
    }

    this.options.logger.debug({ deviceId, action, entityId, status: response.status }, "Script called");
    if (this.options.pressIntervalMs > 0) {
      await delay(this.options.pressIntervalMs);
    }
  }
}
