/**
 * SSE Module - Schemas and Types
 *
 * Defines the event types for Server-Sent Events.
 */
import type { LightState } from "../light/index.js";
import type { SceneState } from "../scene/index.js";

// =============================================================================
// SSE Event Types
// =============================================================================

/**
 * Registry snapshot. Sent on connect and after every registry change.
 */
export type RegistryEvent = Readonly<{
  type: "registry";
  connected: boolean;
  lights: readonly LightState[];
  scenes: readonly SceneState[];
}>;

/**
 * Union of all SSE event types.
 */
export type SseEvent = RegistryEvent;
