import { EventEmitter } from "node:events";
import type { InboundEvent } from "../core/types.js";
import { ActuatorDispatchError, UnknownDeviceError } from "../errors.js";
import { createTestLogger, flushPromises, lightConfig, runtimeConfig } from "../testing/fixtures.js";
import { MqttOutput, parseCommand, parseLux } from "./mqtt-output.js";
import type { MqttConnect } from "./mqtt-output.js";

type Published = { topic: string; payload: string; retain: boolean };

class FakeMqttClient extends EventEmitter {
  connected = true;
  readonly subscribed: string[] = [];
  readonly published: Published[] = [];
  ended = false;

  subscribe(topic: string): this {
    this.subscribed.push(topic);
    return this;
  }

  publish(topic: string, payload: string, options: { qos: 0; retain: boolean }): this {
    this.published.push({ topic, payload, retain: options.retain });
    return this;
  }

  end(): this {
    this.ended = true;
    this.connected = false;
    return this;
  }

  topics(): string[] {
    return this.published.map((entry) => entry.topic);
  }
}

function setup(route: (event: InboundEvent) => Promise<unknown> = async () => undefined) {
  const client = new FakeMqttClient();
  const connect: MqttConnect = () => client;
  const logger = createTestLogger();
  const controls = { route: vi.fn(route) };
  const output = new MqttOutput(runtimeConfig(), controls, logger, connect);
  output.start();
  return { client, controls, logger, output };
}

describe("parseLux", () => {
  it("reads bare numbers and rounds to 0.1 lx", () => {
    expect(parseLux(Buffer.from("123.456"), null)).toBe(123.5);
  });

  it("reads the usual illuminance keys from JSON", () => {
    expect(parseLux(Buffer.from('{"illuminance_lux": 42, "battery": 90}'), null)).toBe(42);
    expect(parseLux(Buffer.from('{"lux": "17"}'), null)).toBe(17);
  });

  it("reads a configured key", () => {
    expect(parseLux(Buffer.from('{"light": 300, "lux": 5}'), "light")).toBe(300);
  });

  it("rejects unusable payloads", () => {
    expect(parseLux(Buffer.from("-3"), null)).toBeNull();
    expect(parseLux(Buffer.from("dark"), null)).toBeNull();
    expect(parseLux(Buffer.from(""), null)).toBeNull();
    expect(parseLux(Buffer.from('{"temperature": 21}'), null)).toBeNull();
  });
});

describe("parseCommand", () => {
  it("accepts bare on/off words", () => {
    expect(parseCommand(Buffer.from("OFF"))).toEqual({ state: "OFF" });
    expect(parseCommand(Buffer.from("on"))).toEqual({ state: "ON" });
  });

  it("accepts JSON schema commands", () => {
    expect(parseCommand(Buffer.from('{"state":"on","brightness":3,"transition":2}'))).toEqual({
      state: "ON",
      brightness: 3,
    });
  });

  it("rejects commands with nothing to do", () => {
    expect(parseCommand(Buffer.from("{}"))).toBeNull();
    expect(parseCommand(Buffer.from('{"state":"dim"}'))).toBeNull();
    expect(parseCommand(Buffer.from("toggle"))).toBeNull();
  });
});

describe("MqttOutput", () => {
  it("subscribes to sensor and set topics", () => {
    const { client } = setup();
    expect(client.subscribed).toEqual(["sensors/living_room/lux", "ir-light-bridge/light/living_room/set"]);
  });

  it("publishes a discovery document per light", () => {
    const { client } = setup();
    const discovery = client.published.find(
      (entry) => entry.topic === "homeassistant/light/ir_light_bridge/living_room/config",
    );

    expect(discovery?.retain).toBe(true);
    expect(JSON.parse(discovery?.payload ?? "{}")).toMatchObject({
      name: "Living Room",
      unique_id: "ir_light_bridge_living_room",
      schema: "json",
      command_topic: "ir-light-bridge/light/living_room/set",
      state_topic: "ir-light-bridge/light/living_room/state",
      availability_topic: "ir-light-bridge/availability",
      brightness_scale: 5,
    });
  });

  it("forwards sensor readings to the router", () => {
    const { client, controls } = setup();
    client.emit("message", "sensors/living_room/lux", Buffer.from('{"illuminance": 312.04}'));
    expect(controls.route).toHaveBeenCalledWith({ kind: "sensor", deviceId: "living_room", lux: 312 });
  });

  it("forwards set commands to the router", () => {
    const { client, controls } = setup();
    client.emit("message", "ir-light-bridge/light/living_room/set", Buffer.from('{"brightness":2}'));
    expect(controls.route).toHaveBeenCalledWith({
      kind: "command",
      deviceId: "living_room",
      command: { brightness: 2 },
    });
  });

  it("drops unreadable payloads with a warning", () => {
    const { client, controls, logger } = setup();
    client.emit("message", "sensors/living_room/lux", Buffer.from("dark"));
    expect(controls.route).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith(
      { topic: "sensors/living_room/lux", deviceId: "living_room", payload: "dark" },
      "Ignoring unreadable lux payload",
    );
  });

  it("logs routing failures by kind", async () => {
    const { client, logger } = setup(async (event) => {
      if (event.kind === "sensor") throw new UnknownDeviceError(event.deviceId);
      throw new ActuatorDispatchError(event.deviceId, "step_up", "remote unavailable");
    });

    client.emit("message", "sensors/living_room/lux", Buffer.from("100"));
    client.emit("message", "ir-light-bridge/light/living_room/set", Buffer.from('{"brightness":5}'));
    await flushPromises();

    expect(logger.error).toHaveBeenCalledWith(
      { deviceId: "living_room", kind: "sensor", error: "Unknown light: living_room" },
      "Rejected by configuration",
    );
    expect(logger.warn).toHaveBeenCalledWith(
      { deviceId: "living_room", action: "step_up", error: "remote unavailable" },
      "Remote press failed",
    );
  });

  it("publishes retained state reports", () => {
    const { client, output } = setup();
    output.push({
      deviceId: "living_room",
      isOn: true,
      step: 4,
      maxStep: 5,
      transition: "turned_on",
      source: "sensor",
    });
    expect(client.published.at(-1)).toEqual({
      topic: "ir-light-bridge/light/living_room/state",
      payload: '{"state":"ON","brightness":4}',
      retain: true,
    });
  });

  it("replays availability and retained payloads after reconnecting", () => {
    const { client } = setup();
    client.published.length = 0;
    client.subscribed.length = 0;

    client.emit("connect");

    expect(client.subscribed).toEqual(["sensors/living_room/lux", "ir-light-bridge/light/living_room/set"]);
    expect(client.topics()).toEqual([
      "ir-light-bridge/availability",
      "homeassistant/light/ir_light_bridge/living_room/config",
    ]);
  });

  it("holds publishes while disconnected", () => {
    const { client, output } = setup();
    client.connected = false;
    client.published.length = 0;
    output.push({
      deviceId: "living_room",
      isOn: false,
      step: 0,
      maxStep: 5,
      transition: "turned_off",
      source: "command",
    });
    expect(client.published).toEqual([]);

    client.connected = true;
    client.emit("connect");
    expect(client.topics()).toContain("ir-light-bridge/light/living_room/state");
  });

  it("announces offline and closes on stop", () => {
    const { client, output } = setup();
    output.stop();
    expect(client.published.at(-1)).toEqual({
      topic: "ir-light-bridge/availability",
      payload: "offline",
      retain: true,
    });
    expect(client.ended).toBe(true);
  });
});
