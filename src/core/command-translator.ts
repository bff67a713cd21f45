import { InvalidCommandError, StepOutOfRangeError } from "../errors.js";
import type { ActuatorAction, LightState } from "./types.js";

export type StepProfile = Readonly<{
  deviceId: string;
  maxStep: number;
  /** Step the physical light comes back at after `turn_on`. */
  defaultOnStep: number;
}>;

function stepsBetween(from: number, to: number): ActuatorAction[] {
  const action: ActuatorAction = to > from ? "step_up" : "step_down";
  return Array.from({ length: Math.abs(to - from) }, () => action);
}

/**
 * Turns a desired (step, on/off) into remote presses, working only from the
 * believed state since the IR light cannot be queried.
 *
 * Off is absorbing: switching off never emits step presses. Switching on
 * always presses `turn_on` first and then walks from the light's resume step.
 */
export function translateCommand(
  current: LightState,
  targetStep: number,
  targetOn: boolean,
  profile: StepProfile,
): ActuatorAction[] {
  if (!Number.isInteger(targetStep) || targetStep < 0 || targetStep > profile.maxStep) {
    throw new StepOutOfRangeError(profile.deviceId, targetStep, profile.maxStep);
  }
  if (targetOn && targetStep === 0) {
    throw new InvalidCommandError(`${profile.deviceId}: cannot be on at step 0`);
  }

  if (!targetOn) {
    return current.isOn ? ["turn_off"] : [];
  }
  if (!current.isOn) {
    return ["turn_on", ...stepsBetween(profile.defaultOnStep, targetStep)];
  }
  return stepsBetween(current.step, targetStep);
}
