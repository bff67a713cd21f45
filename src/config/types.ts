import { z } from "zod";

const HHMM = /^([01]\d|2[0-3]):[0-5]\d$/;

export const BucketSchema = z.object({
  step: z.number().int().min(0),
  minLux: z.number().min(0),
  maxLux: z.number().positive(),
});

export const ActionScriptsSchema = z.object({
  turnOn: z.string().min(1),
  turnOff: z.string().min(1),
  stepUp: z.string().min(1),
  stepDown: z.string().min(1),
});

export const ScheduleEntrySchema = z
  .object({
    at: z.string().regex(HHMM, "expected HH:MM"),
    state: z.enum(["ON", "OFF"]).optional(),
    brightness: z.number().int().min(0).optional(),
  })
  .refine((entry) => entry.state !== undefined || entry.brightness !== undefined, {
    message: "schedule entry needs state or brightness",
  });

export const LightSchema = z.object({
  id: z.string().regex(/^[a-z0-9_-]+$/, "use lowercase letters, digits, _ or -"),
  name: z.string().min(1).optional(),
  sensorTopic: z.string().min(1),
  sensorValueKey: z.string().min(1).optional(),
  lightTopic: z.string().min(1).optional(),
  buckets: z.array(BucketSchema).min(1),
  actions: ActionScriptsSchema,
  defaultOnStep: z.number().int().min(1).optional(),
  schedule: z
    .object({
      enabled: z.boolean().default(true),
      entries: z.array(ScheduleEntrySchema),
    })
    .optional(),
});

export const MqttSettingsSchema = z.object({
  brokerUrl: z.string().min(1),
  username: z.string().optional(),
  password: z.string().optional(),
  clientId: z.string().optional(),
  baseTopic: z.string().min(1).default("ir-light-bridge"),
  discoveryPrefix: z.string().min(1).default("homeassistant"),
  discovery: z.boolean().default(true),
  nodeId: z.string().min(1).optional(),
});

export const HomeAssistantSettingsSchema = z.object({
  url: z.string().url(),
  token: z.string().default(""),
  pressIntervalMs: z.number().int().min(0).default(500),
  requestTimeoutMs: z.number().int().positive().default(10_000),
  dryRun: z.boolean().default(false),
});

export const SettingsSchema = z.object({
  mqtt: MqttSettingsSchema,
  homeAssistant: HomeAssistantSettingsSchema,
  scheduleCheckIntervalSeconds: z.number().int().positive().default(60),
  lights: z.array(LightSchema).min(1),
});

export type Settings = z.infer<typeof SettingsSchema>;
export type MqttSettings = z.infer<typeof MqttSettingsSchema>;
export type HomeAssistantSettings = z.infer<typeof HomeAssistantSettingsSchema>;
export type ActionScripts = z.infer<typeof ActionScriptsSchema>;
export type ScheduleEntry = z.infer<typeof ScheduleEntrySchema>;

/** Half-open lux interval `[minLux, maxLux)` reported as `step`. */
export type BrightnessBucket = Readonly<{
  step: number;
  minLux: number;
  maxLux: number;
}>;

export type LightSchedule = Readonly<{
  enabled: boolean;
  entries: readonly ScheduleEntry[];
}>;

export type LightConfig = Readonly<{
  id: string;
  name: string;
  sensorTopic: string;
  sensorValueKey: string | null;
  lightTopic: string;
  buckets: readonly BrightnessBucket[];
  maxStep: number;
  defaultOnStep: number;
  actions: Readonly<ActionScripts>;
  schedule: LightSchedule | null;
}>;

export type RuntimeConfig = Readonly<{
  mqtt: Readonly<MqttSettings>;
  homeAssistant: Readonly<HomeAssistantSettings>;
  scheduleCheckIntervalSeconds: number;
  lights: readonly LightConfig[];
}>;
