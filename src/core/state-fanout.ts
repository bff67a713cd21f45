import type { Logger } from "../logger.js";
import type { StateOutput } from "../outputs/output.js";
import { asErrorMessage } from "../errors.js";
import type { StateReport } from "./types.js";

export class StateFanout implements StateOutput {
  readonly id = "fanout";
  private readonly outputs: StateOutput[] = [];

  constructor(private readonly logger: Logger) {}

  add(output: StateOutput): void {
    this.outputs.push(output);
  }

  push(report: StateReport): void {
    for (const output of this.outputs) {
      try {
        output.push(report);
      } catch (error) {
        this.logger.error({ output: output.id, deviceId: report.deviceId, error: asErrorMessage(error) }, "State output failed");
      }
    }
  }
}
