import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import { loadRuntimeConfig } from "./config/load-config.js";
import type { RuntimeConfig } from "./config/types.js";
import { EventRouter } from "./core/event-router.js";
import { LightScheduler } from "./core/schedule.js";
import { StateFanout } from "./core/state-fanout.js";
import { SyncEngine } from "./core/sync-engine.js";
import type { Actuator } from "./actuators/actuator.js";
import { DryRunActuator } from "./actuators/dry-run-actuator.js";
import { HomeAssistantActuator } from "./actuators/home-assistant-actuator.js";
import { MqttOutput } from "./outputs/mqtt-output.js";
import { registerRoutes } from "./api/routes.js";
import { WsHub } from "./ws/hub.js";
import { asErrorMessage } from "./errors.js";
import type { Logger } from "./logger.js";

type Bridge = {
  mqttOutput: MqttOutput;
  scheduler: LightScheduler;
};

function createActuator(config: RuntimeConfig, logger: Logger): Actuator {
  if (config.homeAssistant.dryRun) {
    return new DryRunActuator(logger.child({ component: "dry-run" }));
  }
  return new HomeAssistantActuator({
    baseUrl: config.homeAssistant.url,
    token: config.homeAssistant.token,
    lights: config.lights,
    pressIntervalMs: config.homeAssistant.pressIntervalMs,
    requestTimeoutMs: config.homeAssistant.requestTimeoutMs,
    logger: logger.child({ component: "home-assistant" }),
  });
}

async function buildServer(app: FastifyInstance, config: RuntimeConfig): Promise<Bridge> {
  const logger: Logger = app.log;
  const fanout = new StateFanout(logger.child({ component: "fanout" }));
  const actuator = createActuator(config, logger);
  const dispatchTimeoutMs = config.homeAssistant.requestTimeoutMs + config.homeAssistant.pressIntervalMs;
  const engines = config.lights.map(
    (light) =>
      new SyncEngine({
        config: light,
        actuator,
        output: fanout,
        logger: logger.child({ component: "engine" }),
        dispatchTimeoutMs,
      }),
  );
  const router = new EventRouter(engines);

  const mqttOutput = new MqttOutput(config, router, logger.child({ component: "mqtt" }));
  const wsHub = new WsHub(logger.child({ component: "ws" }));
  fanout.add(mqttOutput);
  fanout.add(wsHub);

  const scheduler = new LightScheduler(
    config.lights,
    router,
    logger.child({ component: "schedule" }),
    config.scheduleCheckIntervalSeconds * 1000,
  );

  await app.register(cors, { origin: true });
  await app.register(websocket);
  await registerRoutes(app, { router });

  app.get("/ws", { websocket: true }, (socket) => {
    wsHub.addClient(socket, (event) => {
      const { deviceId, command } = event.payload;
      router.route({ kind: "command", deviceId, command }).catch((error: unknown) => {
        wsHub.send(socket, { type: "error", payload: { deviceId, message: asErrorMessage(error) } });
      });
    });
    wsHub.send(socket, { type: "lights", payload: router.snapshots() });
  });

  app.log.info(
    {
      lights: config.lights.map((light) => ({ id: light.id, maxStep: light.maxStep, sensorTopic: light.sensorTopic })),
      actuator: actuator.id,
    },
    "Bridge configured",
  );

  return { mqttOutput, scheduler };
}

const app = Fastify({ logger: { level: process.env.LOG_LEVEL ?? "info" } });

let config: RuntimeConfig;
try {
  config = await loadRuntimeConfig();
} catch (error) {
  app.log.fatal({ error: asErrorMessage(error) }, "Cannot load settings");
  process.exit(1);
}

const { mqttOutput, scheduler } = await buildServer(app, config);

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  app.log.info({ signal }, "Shutting down");
  scheduler.stop();
  mqttOutput.stop();
  await app.close();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        app.log.error({ error: asErrorMessage(error) }, "Shutdown failed");
        process.exit(1);
      },
    );
  });
}

mqttOutput.start();
scheduler.start();

const port = Number(process.env.PORT ?? 3000);
await app.listen({ port, host: "0.0.0.0" });
