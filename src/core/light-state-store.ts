import type { LightState } from "./types.js";

/**
 * Believed state of a single light. Starts uninitialized (`null`) until the
 * first sensor reading or command gives it a baseline.
 */
export class LightStateStore {
  private state: LightState | null = null;

  constructor(
    readonly deviceId: string,
    readonly maxStep: number,
  ) {}

  get(): LightState | null {
    return this.state;
  }

  isInitialized(): boolean {
    return this.state !== null;
  }

  set(next: LightState): LightState {
    if (!Number.isInteger(next.step) || next.step < 0 || next.step > this.maxStep) {
      throw new RangeError(`${this.deviceId}: step ${next.step} outside 0..${this.maxStep}`);
    }
    if (next.isOn !== next.step > 0) {
      throw new RangeError(`${this.deviceId}: isOn=${next.isOn} contradicts step ${next.step}`);
    }
    this.state = { isOn: next.isOn, step: next.step };
    return this.state;
  }
}
