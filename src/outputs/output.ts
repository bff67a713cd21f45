import type { StateReport } from "../core/types.js";

export interface StateOutput {
  readonly id: string;
  push(report: StateReport): void;
}
