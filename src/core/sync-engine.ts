import type { Actuator } from "../actuators/actuator.js";
import type { LightConfig } from "../config/types.js";
import { ActuatorDispatchError, InvalidCommandError, asErrorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { StateOutput } from "../outputs/output.js";
import { locateLux } from "./brightness-mapper.js";
import { translateCommand } from "./command-translator.js";
import type { StepProfile } from "./command-translator.js";
import { LightStateStore } from "./light-state-store.js";
import { SerialQueue } from "./serial-queue.js";
import type {
  ActuatorAction,
  CommandOutcome,
  LightCommand,
  LightSnapshot,
  LightState,
  StateReport,
  StateTransition,
} from "./types.js";

const OFF: LightState = { isOn: false, step: 0 };
const DEFAULT_DISPATCH_TIMEOUT_MS = 15_000;

export type SyncEngineOptions = {
  config: LightConfig;
  actuator: Actuator;
  output: StateOutput;
  logger: Logger;
  /** Longest a single press may take before it counts as failed and the queue moves on. */
  dispatchTimeoutMs?: number;
};

export function transitionBetween(prior: LightState | null, next: LightState): StateTransition {
  if (!next.isOn) {
    return prior === null || prior.isOn ? "turned_off" : "unchanged";
  }
  if (prior === null || !prior.isOn) return "turned_on";
  return prior.step === next.step ? "unchanged" : "step_changed";
}

/**
 * Reads a set command as a target. `OFF` or brightness 0 means off; a bare
 * `ON` keeps the current level, or the resume step when the light is off.
 */
export function resolveTarget(command: LightCommand, current: LightState | null, profile: StepProfile): LightState {
  const { state, brightness } = command;
  if (state === undefined && brightness === undefined) {
    throw new InvalidCommandError(`${profile.deviceId}: command has neither state nor brightness`);
  }
  if (state === "OFF" || brightness === 0) return OFF;
  if (brightness !== undefined) return { isOn: true, step: brightness };
  return { isOn: true, step: current?.isOn ? current.step : profile.defaultOnStep };
}

/**
 * Owns one light's believed state. Sensor readings and commands for the light
 * are queued and handled strictly one after another, so the two paths never
 * read-modify-write the store concurrently. Each press is bounded by
 * `dispatchTimeoutMs`, so a hung actuator holds the queue for at most that long.
 */
export class SyncEngine {
  readonly deviceId: string;
  private readonly store: LightStateStore;
  private readonly queue = new SerialQueue();
  private readonly profile: StepProfile;
  private readonly logger: Logger;

  constructor(private readonly options: SyncEngineOptions) {
    const { config } = options;
    this.deviceId = config.id;
    this.store = new LightStateStore(config.id, config.maxStep);
    this.profile = { deviceId: config.id, maxStep: config.maxStep, defaultOnStep: config.defaultOnStep };
    this.logger = options.logger.child({ deviceId: config.id });
  }

  handleSensor(lux: number): Promise<StateReport> {
    return this.queue.run(() => this.applySensor(lux));
  }

  handleCommand(command: LightCommand): Promise<CommandOutcome> {
    return this.queue.run(() => this.applyCommand(command));
  }

  getState(): LightState | null {
    return this.store.get();
  }

  snapshot(): LightSnapshot {
    const state = this.store.get();
    return {
      deviceId: this.deviceId,
      name: this.options.config.name,
      maxStep: this.options.config.maxStep,
      initialized: state !== null,
      isOn: state?.isOn ?? false,
      step: state?.step ?? 0,
    };
  }

  private applySensor(lux: number): StateReport {
    if (!Number.isFinite(lux) || lux < 0) {
      throw new RangeError(`${this.deviceId}: lux reading ${lux} is not a non-negative number`);
    }

    const placement = locateLux(lux, this.options.config.buckets);
    if (placement.clamped) {
      this.logger.warn({ lux, step: placement.step, clamped: placement.clamped }, "Lux reading outside configured buckets");
    }

    const prior = this.store.get();
    const next = this.store.set({ isOn: placement.step !== 0, step: placement.step });
    const report = this.report(next, transitionBetween(prior, next), "sensor");
    this.logger.debug({ lux, step: next.step, transition: report.transition }, "Sensor reading applied");
    return report;
  }

  private async applyCommand(command: LightCommand): Promise<CommandOutcome> {
    const prior = this.store.get();
    const target = resolveTarget(command, prior, this.profile);
    const planned = translateCommand(prior ?? OFF, target.step, target.isOn, this.profile);

    if (prior === null) {
      this.logger.warn(
        { command, skipped: planned },
        "No baseline yet; adopting commanded state without sending remote presses",
      );
    } else {
      await this.dispatchAll(planned);
    }

    const next = this.store.set(target);
    const report = this.report(next, transitionBetween(prior, next), "command");
    this.logger.info({ command, actions: planned.length, step: next.step, isOn: next.isOn }, "Command applied");
    return { actions: prior === null ? [] : planned, report };
  }

  private async dispatchAll(actions: readonly ActuatorAction[]): Promise<void> {
    let sent = 0;
    for (const action of actions) {
      try {
        await this.dispatchWithTimeout(action);
      } catch (error) {
        this.logger.warn(
          { action, sent, planned: actions.length, error: asErrorMessage(error) },
          "Remote press failed; keeping previous state",
        );
        if (error instanceof ActuatorDispatchError) throw error;
        throw new ActuatorDispatchError(this.deviceId, action, asErrorMessage(error));
      }
      sent += 1;
    }
  }

  private async dispatchWithTimeout(action: ActuatorAction): Promise<void> {
    const timeoutMs = this.options.dispatchTimeoutMs ?? DEFAULT_DISPATCH_TIMEOUT_MS;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(new ActuatorDispatchError(this.deviceId, action, `${action} timed out after ${timeoutMs} ms`));
      }, timeoutMs);
    });
    try {
      await Promise.race([this.options.actuator.dispatch(this.deviceId, action), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private report(state: LightState, transition: StateTransition, source: StateReport["source"]): StateReport {
    const report: StateReport = {
      deviceId: this.deviceId,
      isOn: state.isOn,
      step: state.step,
      maxStep: this.options.config.maxStep,
      transition,
      source,
    };
    this.options.output.push(report);
    return report;
  }
}
