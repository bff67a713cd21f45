import type { ActuatorAction } from "../core/types.js";
import type { Logger } from "../logger.js";
import type { Actuator } from "./actuator.js";

/** Logs presses instead of sending them; used with `homeAssistant.dryRun`. */
export class DryRunActuator implements Actuator {
  readonly id = "dry-run";

  constructor(private readonly logger: Logger) {}

  async dispatch(deviceId: string, action: ActuatorAction): Promise<void> {
    this.logger.info({ deviceId, action }, "Dry run: remote press skipped");
  }
}
