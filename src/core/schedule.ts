import type { LightConfig, ScheduleEntry } from "../config/types.js";
import { asErrorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { CommandEvent, LightState } from "./types.js";

export type ScheduleRouter = {
  route: (event: CommandEvent) => Promise<unknown>;
  get: (deviceId: string) => { getState(): LightState | null };
};

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatClock(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

function formatDay(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Last entry whose `at` is not after `clock`; entries are sorted by `at`. */
export function currentEntry(entries: readonly ScheduleEntry[], clock: string): ScheduleEntry | null {
  let match: ScheduleEntry | null = null;
  for (const entry of entries) {
    if (entry.at > clock) break;
    match = entry;
  }
  return match;
}

/**
 * Time-of-day "auto mode". Each entry is sent once per day when it becomes
 * the active one; a failed send is retried on the next tick. Lights without a
 * sensor baseline are skipped until one arrives, since no press can be
 * counted from an unknown state.
 */
export class LightScheduler {
  private timer: NodeJS.Timeout | null = null;
  private readonly applied = new Map<string, string>();

  constructor(
    private readonly lights: readonly LightConfig[],
    private readonly router: ScheduleRouter,
    private readonly logger: Logger,
    private readonly intervalMs: number,
    private readonly now: () => Date = () => new Date(),
  ) {}

  start(): void {
    if (this.timer) return;
    if (!this.lights.some((light) => light.schedule?.enabled)) return;
    void this.tick();
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /** Returns how many commands were routed. */
  async tick(): Promise<number> {
    const now = this.now();
    const clock = formatClock(now);
    const day = formatDay(now);
    let routed = 0;

    for (const light of this.lights) {
      if (!light.schedule?.enabled) continue;
      const entry = currentEntry(light.schedule.entries, clock);
      if (!entry) continue;
      const key = `${day}T${entry.at}`;
      if (this.applied.get(light.id) === key) continue;
      if (this.router.get(light.id).getState() === null) {
        this.logger.debug({ deviceId: light.id, at: entry.at }, "Schedule entry waiting for a sensor baseline");
        continue;
      }

      try {
        await this.router.route({
          kind: "command",
          deviceId: light.id,
          command: { state: entry.state, brightness: entry.brightness },
        });
        this.applied.set(light.id, key);
        routed += 1;
        this.logger.info({ deviceId: light.id, at: entry.at, state: entry.state, brightness: entry.brightness }, "Schedule entry applied");
      } catch (error) {
        this.logger.warn({ deviceId: light.id, at: entry.at, error: asErrorMessage(error) }, "Schedule entry failed; will retry");
      }
    }
    return routed;
  }
}
