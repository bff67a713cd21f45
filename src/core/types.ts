export type ActuatorAction = "turn_on" | "turn_off" | "step_up" | "step_down";

/** Believed state of one light. `isOn` is false exactly when `step` is 0. */
export type LightState = Readonly<{
  isOn: boolean;
  step: number;
}>;

export type OnOff = "ON" | "OFF";

/** Settable fields of the light entity, as received from a set topic or the API. */
export type LightCommand = Readonly<{
  state?: OnOff;
  brightness?: number;
}>;

export type SensorEvent = Readonly<{
  kind: "sensor";
  deviceId: string;
  lux: number;
}>;

export type CommandEvent = Readonly<{
  kind: "command";
  deviceId: string;
  command: LightCommand;
}>;

export type InboundEvent = SensorEvent | CommandEvent;

export type StateTransition = "turned_on" | "turned_off" | "step_changed" | "unchanged";

export type StateReport = Readonly<{
  deviceId: string;
  isOn: boolean;
  step: number;
  maxStep: number;
  transition: StateTransition;
  source: "sensor" | "command";
}>;

export type CommandOutcome = Readonly<{
  actions: readonly ActuatorAction[];
  report: StateReport;
}>;

export type LightSnapshot = Readonly<{
  deviceId: string;
  name: string;
  maxStep: number;
  initialized: boolean;
  isOn: boolean;
  step: number;
}>;
