/**
 * API routes for the mesh light bridge.
 *
 * Routes are organized by domain:
 * - /api/health - Health check
 * - /api/lights/* - Light and group control
 * - /api/scenes/* - Scene activation
 * - /api/events - SSE stream of registry snapshots
 */
import { Hono } from "hono";
import { Result, ok } from "neverthrow";

import {
  type LightError,
  type LightTracker,
  TurnOnRequestSchema,
  formatLightError,
} from "../light/index.js";
import { createLogger } from "../logger.js";
import type { MeshCoordinator, MeshError } from "../mesh/index.js";
import {
  type SceneError,
  type SceneTracker,
  formatSceneError,
} from "../scene/index.js";
import {
  createSseStream,
  getClientCount,
  removeClient,
  toRegistryEvent,
} from "../sse/index.js";

const log = createLogger("api");

export const API_VERSION = "1.0.0";

export type RouteDependencies = Readonly<{
  coordinator: MeshCoordinator;
  lights: LightTracker;
  scenes: SceneTracker;
}>;

type ErrorStatus = 404 | 502 | 503;

/**
 * 503 while the bus is unreachable, 502 when a publish failed.
 */
function commandStatus(cause: MeshError): 502 | 503 {
  return cause.type === "NOT_CONNECTED" ? 503 : 502;
}

function lightErrorStatus(error: LightError): ErrorStatus {
  return error.type === "UNKNOWN_LIGHT" ? 404 : commandStatus(error.cause);
}

function sceneErrorStatus(error: SceneError): ErrorStatus {
  return error.type === "UNKNOWN_SCENE" ? 404 : commandStatus(error.cause);
}

const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  () => "Request body is not valid JSON",
);

export function createRoutes({
  coordinator,
  lights,
  scenes,
}: RouteDependencies): Hono {
  const routes = new Hono();

  // ===========================================================================
  // Health Check
  // ===========================================================================

  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      requestId,
      version: API_VERSION,
      connected: coordinator.available(),
      registry: {
        lights: coordinator.lights.size,
        groups: coordinator.groups.size,
        scenes: coordinator.scenes.size,
      },
      sseClients: getClientCount(),
    });
  });

  // ===========================================================================
  // Lights
  // ===========================================================================

  routes.get("/api/lights", (c) => {
    return c.json({ lights: lights.list(), requestId: c.get("requestId") });
  });

  routes.post("/api/lights/:id/on", async (c) => {
    const requestId = c.get("requestId");
    const id = c.req.param("id");
    log.info({ requestId, id }, "POST /api/lights/:id/on");

    const text = await c.req.text();
    const body: Result<unknown, string> =
      text.trim() === "" ? ok({}) : parseJson(text);
    if (body.isErr()) {
      return c.json({ success: false, error: body.error, requestId }, 400);
    }

    const parsed = TurnOnRequestSchema.safeParse(body.value);
    if (!parsed.success) {
      return c.json(
        {
          success: false,
          error: "Invalid turn-on request",
          issues: parsed.error.issues.map((issue) => ({
            path: issue.path.join("."),
            message: issue.message,
          })),
          requestId,
        },
        400,
      );
    }

    const result = await lights.turnOn(id, parsed.data);
    if (result.isErr()) {
      log.warn(
        { requestId, error: formatLightError(result.error) },
        "Failed to turn light on",
      );
      return c.json(
        { success: false, error: result.error.message, requestId },
        lightErrorStatus(result.error),
      );
    }

    return c.json({ success: true, light: result.value, requestId });
  });

  routes.post("/api/lights/:id/off", async (c) => {
    const requestId = c.get("requestId");
    const id = c.req.param("id");
    log.info({ requestId, id }, "POST /api/lights/:id/off");

    const result = await lights.turnOff(id);
    if (result.isErr()) {
      log.warn(
        { requestId, error: formatLightError(result.error) },
        "Failed to turn light off",
      );
      return c.json(
        { success: false, error: result.error.message, requestId },
        lightErrorStatus(result.error),
      );
    }

    return c.json({ success: true, light: result.value, requestId });
  });

  // ===========================================================================
  // Scenes
  // ===========================================================================

  routes.get("/api/scenes", (c) => {
    return c.json({ scenes: scenes.list(), requestId: c.get("requestId") });
  });

  routes.post("/api/scenes/:id/activate", async (c) => {
    const requestId = c.get("requestId");
    const id = c.req.param("id");
    log.info({ requestId, id }, "POST /api/scenes/:id/activate");

    const result = await scenes.activate(id);
    if (result.isErr()) {
      log.warn(
        { requestId, error: formatSceneError(result.error) },
        "Failed to activate scene",
      );
      return c.json(
        { success: false, error: result.error.message, requestId },
        sceneErrorStatus(result.error),
      );
    }

    return c.json({ success: true, scene: result.value, requestId });
  });

  // ===========================================================================
  // Server-Sent Events
  // ===========================================================================

  routes.get("/api/events", (c) => {
    const requestId = c.get("requestId");
    const { stream, clientId } = createSseStream(
      toRegistryEvent(coordinator.available(), lights.list(), scenes.list()),
    );
    log.debug({ requestId, clientId }, "GET /api/events");

    c.req.raw.signal.addEventListener("abort", () => {
      removeClient(clientId);
    });

    c.header("Content-Type", "text/event-stream");
    c.header("Cache-Control", "no-cache");
    c.header("Connection", "keep-alive");
    return c.body(stream);
  });

  return routes;
}
