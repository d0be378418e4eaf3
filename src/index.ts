/**
 * Mesh Light Bridge - Application Entry Point
 *
 * Sets up:
 * - Mesh coordinator on the MQTT bus
 * - Light, group and scene trackers
 * - Hono server with control routes and SSE
 * - Request ID tracing
 * - Global error handling
 */
import { serve } from "@hono/node-server";
import { Hono } from "hono";

import { errorHandler } from "./api/errorHandler.js";
import { requestIdMiddleware } from "./api/middleware/requestId.js";
import { createRoutes } from "./api/routes.js";
import {
  config,
  getEntryId,
  getMeshConfig,
  getMqttCredentials,
} from "./config.js";
import { LightTracker } from "./light/index.js";
import { createLogger } from "./logger.js";
import { MeshCoordinator, formatMeshError } from "./mesh/index.js";
import { SceneTracker } from "./scene/index.js";
import {
  broadcastRegistry,
  disconnectAllClients,
  toRegistryEvent,
} from "./sse/index.js";

const log = createLogger("api");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  MESH LIGHT BRIDGE");
console.log("========================================");
console.log("");

// Non-sensitive values only
log.info(
  {
    port: config.PORT,
    host: config.HOST,
    env: config.NODE_ENV,
    mqttBroker: `${config.MQTT_HOST}:${config.MQTT_PORT}`,
    mqttAuth: getMqttCredentials() !== null,
    gatewayTopic: config.GATEWAY_TOPIC,
    entryId: getEntryId(),
  },
  "Configuration loaded",
);

// =============================================================================
// COORDINATOR AND ENTITIES
// =============================================================================

const coordinator = new MeshCoordinator(getMeshConfig());
const lights = new LightTracker(coordinator, getEntryId());
const scenes = new SceneTracker(coordinator, getEntryId());

const publishRegistry = () => {
  broadcastRegistry(
    toRegistryEvent(coordinator.available(), lights.list(), scenes.list()),
  );
};

// Trackers subscribed first, so snapshots include new entities
coordinator.subscribe(publishRegistry);

// =============================================================================
// HONO SERVER SETUP
// =============================================================================

const app = new Hono();

// Global middleware
app.use("*", requestIdMiddleware);

// Error handler
app.onError(errorHandler);

// Mount routes
app.route("/", createRoutes({ coordinator, lights, scenes }));

// =============================================================================
// START SERVER
// =============================================================================

const server = serve(
  { fetch: app.fetch, port: config.PORT, hostname: config.HOST },
  (info) => {
    log.info(
      { port: info.port, env: config.NODE_ENV, appName: config.APP_NAME },
      `🚀 ${config.APP_NAME} listening on ${config.HOST}:${info.port}`,
    );
  },
);

// =============================================================================
// CONNECT TO THE BUS
// =============================================================================

const connectToBus = async () => {
  const result = await coordinator.connect(
    config.MQTT_HOST,
    config.MQTT_PORT,
    getMqttCredentials(),
  );

  if (result.isErr()) {
    // Not retried: the client only reconnects after a first successful connect
    log.error(
      { error: formatMeshError(result.error) },
      "Gateway bus unavailable",
    );
  }

  publishRegistry();
};

connectToBus().catch((error: unknown) => {
  log.error({ error }, "Bus connection crashed");
});

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = async (signal: string) => {
  log.info({ signal }, `${signal} received. Shutting down...`);

  lights.dispose();
  scenes.dispose();

  // Close SSE connections
  disconnectAllClients();

  const closed = await coordinator.disconnect();
  if (closed.isErr()) {
    log.error({ error: formatMeshError(closed.error) }, "MQTT close failed");
  }

  server.close(() => {
    log.info("Shutdown complete");
    process.exit(0);
  });
};

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
