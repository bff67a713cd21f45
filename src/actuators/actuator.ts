import type { ActuatorAction } from "../core/types.js";

export interface Actuator {
  readonly id: string;
  /** Rejects with ActuatorDispatchError when the press could not be sent. */
  dispatch(deviceId: string, action: ActuatorAction): Promise<void>;
}
