import mqtt from "mqtt";
import type { IClientOptions } from "mqtt";
import type { LightConfig, RuntimeConfig } from "../config/types.js";
import { LightCommandSchema, isRecord } from "../core/command-schema.js";
import type { InboundEvent, LightCommand, StateReport } from "../core/types.js";
import { ActuatorDispatchError, ConfigurationError, InvalidCommandError, asErrorMessage } from "../errors.js";
import { isDebugEnabled } from "../logger.js";
import type { Logger } from "../logger.js";
import type { StateOutput } from "./output.js";

const DEFAULT_LUX_KEYS = ["illuminance_lux", "illuminance", "lux"];

/** The part of mqtt's `MqttClient` this output talks to. */
export type MqttClientLike = {
  readonly connected: boolean;
  on(event: "connect" | "close" | "reconnect" | "offline", listener: () => void): unknown;
  on(event: "message", listener: (topic: string, payload: Buffer) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
  subscribe(topic: string, options: { qos: 0 }): unknown;
  publish(topic: string, payload: string, options: { qos: 0; retain: boolean }): unknown;
  end(force?: boolean): unknown;
};

export type MqttConnect = (brokerUrl: string, options: IClientOptions) => MqttClientLike;

export type MqttControlApi = {
  route: (event: InboundEvent) => Promise<unknown>;
};

function sanitizeId(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9_]+/g, "_").replace(/^_+|_+$/g, "");
}

function parsePayload(raw: Buffer): unknown {
  const text = raw.toString("utf8").trim();
  if (text.length === 0) return "";
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
}

function parseOnOff(value: unknown): "ON" | "OFF" | null {
  if (typeof value === "boolean") return value ? "ON" : "OFF";
  if (typeof value !== "string") return null;
  const normalized = value.trim().toLowerCase();
  if (normalized === "on" || normalized === "true") return "ON";
  if (normalized === "off" || normalized === "false") return "OFF";
  return null;
}

/**
 * Reads lux from a bare number or from a JSON object (first of `valueKey`, or
 * the usual illuminance keys). Rounded to 0.1 lx; anything negative or
 * non-numeric gives null.
 */
export function parseLux(raw: Buffer, valueKey: string | null): number | null {
  const payload = parsePayload(raw);
  let candidate: unknown = payload;
  if (isRecord(payload)) {
    const keys = valueKey ? [valueKey] : DEFAULT_LUX_KEYS;
    const key = keys.find((item) => item in payload);
    candidate = key === undefined ? undefined : payload[key];
  }
  if (typeof candidate === "string" && candidate.trim().length === 0) return null;
  if (typeof candidate !== "number" && typeof candidate !== "string") return null;
  const lux = Number(candidate);
  if (!Number.isFinite(lux) || lux < 0) return null;
  return Math.round(lux * 10) / 10;
}

/** Accepts `{"state":"ON","brightness":3}` or a bare `ON` / `OFF`. */
export function parseCommand(raw: Buffer): LightCommand | null {
  const payload = parsePayload(raw);
  const direct = parseOnOff(payload);
  if (direct) return { state: direct };
  if (!isRecord(payload)) return null;
  const parsed = LightCommandSchema.safeParse(payload);
  if (!parsed.success) return null;
  if (parsed.data.state === undefined && parsed.data.brightness === undefined) return null;
  return parsed.data;
}

function toClientOptions(config: RuntimeConfig, availabilityTopic: string): IClientOptions {
  const options: IClientOptions = {
    will: { topic: availabilityTopic, payload: "offline", qos: 0, retain: true },
  };
  if (config.mqtt.clientId) options.clientId = config.mqtt.clientId;
  if (config.mqtt.username) options.username = config.mqtt.username;
  if (config.mqtt.password) options.password = config.mqtt.password;
  return options;
}

const defaultConnect: MqttConnect = (brokerUrl, options) => mqtt.connect(brokerUrl, options);

/**
 * Broker side of the bridge: subscribes to every light's sensor and set
 * topics, forwards what arrives to the router, and publishes state reports
 * plus Home Assistant discovery documents.
 */
export class MqttOutput implements StateOutput {
  readonly id = "mqtt";
  private client: MqttClientLike | null = null;
  private readonly retainedPayloadCache = new Map<string, string>();
  private readonly subscriptions = new Set<string>();
  private readonly lightsById = new Map<string, LightConfig>();
  private readonly lightsBySensorTopic = new Map<string, LightConfig[]>();
  private readonly lightsByCommandTopic = new Map<string, LightConfig>();
  private readonly availabilityTopic: string;
  private readonly nodeId: string;
  private readonly debug = isDebugEnabled();

  constructor(
    private readonly config: RuntimeConfig,
    private readonly controls: MqttControlApi,
    private readonly logger: Logger,
    private readonly connect: MqttConnect = defaultConnect,
  ) {
    this.availabilityTopic = `${config.mqtt.baseTopic}/availability`;
    this.nodeId = sanitizeId(config.mqtt.nodeId ?? config.mqtt.baseTopic);
    for (const light of config.lights) {
      this.lightsById.set(light.id, light);
      this.lightsByCommandTopic.set(`${light.lightTopic}/set`, light);
      const sharing = this.lightsBySensorTopic.get(light.sensorTopic) ?? [];
      sharing.push(light);
      this.lightsBySensorTopic.set(light.sensorTopic, sharing);
    }
  }

  start(): void {
    if (this.client) return;
    const client = this.connect(this.config.mqtt.brokerUrl, toClientOptions(this.config, this.availabilityTopic));
    this.client = client;

    client.on("connect", () => {
      for (const topic of this.subscriptions) {
        client.subscribe(topic, { qos: 0 });
      }
      client.publish(this.availabilityTopic, "online", { qos: 0, retain: true });
      for (const [topic, payload] of this.retainedPayloadCache.entries()) {
        client.publish(topic, payload, { qos: 0, retain: true });
      }
      this.logger.info({ brokerUrl: this.config.mqtt.brokerUrl, topics: this.subscriptions.size }, "MQTT connected");
    });

    client.on("close", () => {
      if (this.debug) this.logger.info({ brokerUrl: this.config.mqtt.brokerUrl }, "MQTT disconnected");
    });

    client.on("reconnect", () => {
      if (this.debug) this.logger.info({ brokerUrl: this.config.mqtt.brokerUrl }, "MQTT reconnecting");
    });

    client.on("offline", () => {
      this.logger.warn({ brokerUrl: this.config.mqtt.brokerUrl }, "MQTT offline");
    });

    client.on("message", (topic, payload) => {
      this.handleMessage(topic, payload);
    });

    client.on("error", (error) => {
      this.logger.error({ brokerUrl: this.config.mqtt.brokerUrl, message: error.message }, "MQTT client error");
    });

    for (const light of this.config.lights) {
      this.subscribe(light.sensorTopic);
      this.subscribe(`${light.lightTopic}/set`);
      if (this.config.mqtt.discovery) this.publishDiscovery(light);
    }
  }

  push(report: StateReport): void {
    const light = this.lightsById.get(report.deviceId);
    if (!light) return;
    this.publishJsonRetained(`${light.lightTopic}/state`, {
      state: report.isOn ? "ON" : "OFF",
      brightness: report.step,
    });
  }

  stop(): void {
    const client = this.client;
    if (!client) return;
    this.publish(this.availabilityTopic, "offline", true);
    client.end(false);
    this.client = null;
  }

  private publishDiscovery(light: LightConfig): void {
    const objectId = sanitizeId(light.id);
    const payload = {
      name: light.name,
      unique_id: `${this.nodeId}_${objectId}`,
      schema: "json",
      command_topic: `${light.lightTopic}/set`,
      state_topic: `${light.lightTopic}/state`,
      availability_topic: this.availabilityTopic,
      payload_available: "online",
      payload_not_available: "offline",
      brightness: true,
      brightness_scale: light.maxStep,
      supported_color_modes: ["brightness"],
      device: {
        identifiers: [`${this.nodeId}_${objectId}`],
        name: light.name,
        manufacturer: "ir-light-bridge",
        model: "IR ceiling light",
      },
    };
    this.publishJsonRetained(`${this.config.mqtt.discoveryPrefix}/light/${this.nodeId}/${objectId}/config`, payload);
  }

  private handleMessage(topic: string, raw: Buffer): void {
    if (this.debug) {
      this.logger.debug({ topic, payload: raw.toString("utf8") }, "MQTT message");
    }

    for (const light of this.lightsBySensorTopic.get(topic) ?? []) {
      const lux = parseLux(raw, light.sensorValueKey);
      if (lux === null) {
        this.logger.warn({ topic, deviceId: light.id, payload: raw.toString("utf8") }, "Ignoring unreadable lux payload");
        continue;
      }
      this.forward({ kind: "sensor", deviceId: light.id, lux });
    }

    const commandLight = this.lightsByCommandTopic.get(topic);
    if (commandLight) {
      const command = parseCommand(raw);
      if (!command) {
        this.logger.warn({ topic, deviceId: commandLight.id, payload: raw.toString("utf8") }, "Ignoring unreadable command");
        return;
      }
      this.forward({ kind: "command", deviceId: commandLight.id, command });
    }
  }

  private forward(event: InboundEvent): void {
    this.controls.route(event).catch((error: unknown) => {
      if (error instanceof ConfigurationError) {
        this.logger.error({ deviceId: event.deviceId, kind: event.kind, error: error.message }, "Rejected by configuration");
      } else if (error instanceof InvalidCommandError) {
        this.logger.warn({ deviceId: event.deviceId, error: error.message }, "Rejected command");
      } else if (error instanceof ActuatorDispatchError) {
        this.logger.warn({ deviceId: event.deviceId, action: error.action, error: error.message }, "Remote press failed");
      } else {
        this.logger.error({ deviceId: event.deviceId, kind: event.kind, error: asErrorMessage(error) }, "Event failed");
      }
    });
  }

  private subscribe(topic: string): void {
    if (this.subscriptions.has(topic)) return;
    this.subscriptions.add(topic);
    this.client?.subscribe(topic, { qos: 0 });
  }

  private publishJsonRetained(topic: string, payload: unknown): void {
    const serialized = JSON.stringify(payload);
    this.retainedPayloadCache.set(topic, serialized);
    this.publish(topic, serialized, true);
  }

  private publish(topic: string, payload: string, retain: boolean): void {
    if (!this.client?.connected) return;
    this.client.publish(topic, payload, { qos: 0, retain });
  }
}
