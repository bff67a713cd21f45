import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { ConfigurationError, asErrorMessage } from "../errors.js";
import { SettingsSchema } from "./types.js";
import type { BrightnessBucket, LightConfig, LightSchedule, RuntimeConfig, Settings } from "./types.js";

const DEFAULT_CONFIG_PATH = "data/settings.json";

type RawLight = Settings["lights"][number];

function trimTopic(value: string): string {
  return value.trim().replace(/\/+$/, "");
}

/**
 * Buckets must tile the lux axis: sorted, touching end to start, with steps
 * counting up by one. Returns every problem found rather than the first.
 */
export function validateBuckets(lightId: string, buckets: readonly BrightnessBucket[]): string[] {
  const issues: string[] = [];
  buckets.forEach((bucket, index) => {
    if (bucket.maxLux <= bucket.minLux) {
      issues.push(`${lightId}: bucket ${index} has maxLux ${bucket.maxLux} <= minLux ${bucket.minLux}`);
    }
    const previous = buckets[index - 1];
    if (!previous) return;
    if (bucket.step !== previous.step + 1) {
      issues.push(`${lightId}: bucket ${index} step ${bucket.step} does not follow step ${previous.step}`);
    }
    if (bucket.minLux < previous.maxLux) {
      issues.push(`${lightId}: bucket ${index} overlaps bucket ${index - 1} (${bucket.minLux} < ${previous.maxLux})`);
    } else if (bucket.minLux > previous.maxLux) {
      issues.push(`${lightId}: gap between ${previous.maxLux} and ${bucket.minLux} lx`);
    }
  });
  const last = buckets[buckets.length - 1];
  if (last && last.step < 1) {
    issues.push(`${lightId}: needs at least one bucket above step 0`);
  }
  return issues;
}

function buildLight(raw: RawLight, baseTopic: string, issues: string[]): LightConfig {
  const buckets = raw.buckets.map((bucket) => Object.freeze({ ...bucket }));
  issues.push(...validateBuckets(raw.id, buckets));

  const maxStep = buckets[buckets.length - 1]?.step ?? 0;
  const defaultOnStep = raw.defaultOnStep ?? maxStep;
  if (defaultOnStep > maxStep) {
    issues.push(`${raw.id}: defaultOnStep ${defaultOnStep} is above the highest step ${maxStep}`);
  }

  let schedule: LightSchedule | null = null;
  if (raw.schedule) {
    const entries = [...raw.schedule.entries].sort((a, b) => a.at.localeCompare(b.at));
    for (const entry of entries) {
      if (entry.brightness !== undefined && entry.brightness > maxStep) {
        issues.push(`${raw.id}: schedule entry ${entry.at} asks for step ${entry.brightness} above ${maxStep}`);
      }
    }
    schedule = { enabled: raw.schedule.enabled, entries };
  }

  return Object.freeze({
    id: raw.id,
    name: raw.name ?? raw.id,
    sensorTopic: raw.sensorTopic.trim(),
    sensorValueKey: raw.sensorValueKey ?? null,
    lightTopic: trimTopic(raw.lightTopic ?? `${baseTopic}/light/${raw.id}`),
    buckets: Object.freeze(buckets),
    maxStep,
    defaultOnStep,
    actions: Object.freeze({ ...raw.actions }),
    schedule,
  });
}

/**
 * Validates a parsed settings document. Throws a single ConfigurationError
 * listing every issue; nothing falls back to a guessed default.
 */
export function parseRuntimeConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const result = SettingsSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ConfigurationError(`Invalid settings:\n  ${details.join("\n  ")}`);
  }

  const settings = result.data;
  const baseTopic = trimTopic(settings.mqtt.baseTopic);
  const issues: string[] = [];
  const lights = settings.lights.map((light) => buildLight(light, baseTopic, issues));

  const seenIds = new Set<string>();
  const seenLightTopics = new Set<string>();
  for (const light of lights) {
    if (seenIds.has(light.id)) issues.push(`duplicate light id ${light.id}`);
    if (seenLightTopics.has(light.lightTopic)) issues.push(`duplicate light topic ${light.lightTopic}`);
    seenIds.add(light.id);
    seenLightTopics.add(light.lightTopic);
  }

  if (issues.length > 0) {
    throw new ConfigurationError(`Invalid settings:\n  ${issues.join("\n  ")}`);
  }

  return Object.freeze({
    mqtt: Object.freeze({ ...settings.mqtt, baseTopic }),
    homeAssistant: Object.freeze({
      ...settings.homeAssistant,
      url: settings.homeAssistant.url.replace(/\/$/, ""),
      token: env.HA_TOKEN ?? settings.homeAssistant.token,
    }),
    scheduleCheckIntervalSeconds: settings.scheduleCheckIntervalSeconds,
    lights: Object.freeze(lights),
  });
}

async function readJsonFile(relativePath: string): Promise<unknown> {
  const fullPath = resolve(process.cwd(), relativePath);
  let raw: string;
  try {
    raw = await readFile(fullPath, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read settings file ${fullPath}: ${asErrorMessage(error)}`);
  }
  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    throw new ConfigurationError(`Settings file ${fullPath} is not valid JSON: ${asErrorMessage(error)}`);
  }
}

export async function loadRuntimeConfig(
  path: string = process.env.IR_BRIDGE_CONFIG ?? DEFAULT_CONFIG_PATH,
): Promise<RuntimeConfig> {
  return parseRuntimeConfig(await readJsonFile(path));
}
