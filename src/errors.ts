import type { ActuatorAction } from "./core/types.js";

/**
 * Operator-facing misconfiguration: bad settings file, an event for a light
 * that is not configured, or a command asking for a step the light does not have.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class UnknownDeviceError extends ConfigurationError {
  constructor(readonly deviceId: string) {
    super(`Unknown light: ${deviceId}`);
    this.name = "UnknownDeviceError";
  }
}

export class StepOutOfRangeError extends ConfigurationError {
  constructor(
    readonly deviceId: string,
    readonly step: number,
    readonly maxStep: number,
  ) {
    super(`Step ${step} is outside 0..${maxStep} for ${deviceId}`);
    this.name = "StepOutOfRangeError";
  }
}

/** A command that names no change, or a contradictory one (on at step 0). */
export class InvalidCommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidCommandError";
  }
}

/**
 * The remote service call behind an actuator action failed. The engine keeps
 * the previously believed state when it sees this.
 */
export class ActuatorDispatchError extends Error {
  constructor(
    readonly deviceId: string,
    readonly action: ActuatorAction,
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "ActuatorDispatchError";
  }
}

export function asErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return "Unknown error";
}
