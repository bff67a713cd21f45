import type { LightCommand, LightSnapshot, StateReport } from "../core/types.js";

export type ServerEvent =
  | { type: "lights"; payload: LightSnapshot[] }
  | { type: "state"; payload: StateReport }
  | { type: "error"; payload: { deviceId: string; message: string } };

export type ClientEvent = { type: "command"; payload: { deviceId: string; command: LightCommand } };
