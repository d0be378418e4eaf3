/**
 * SSE Module - Pure Transformations
 */
import type { LightState } from "../light/index.js";
import type { SceneState } from "../scene/index.js";
import type { RegistryEvent, SseEvent } from "./schema.js";

const encoder = new TextEncoder();

export function toRegistryEvent(
  connected: boolean,
  lights: readonly LightState[],
  scenes: readonly SceneState[],
): RegistryEvent {
  return { type: "registry", connected, lights, scenes };
}

/**
 * One SSE frame: the event name, then the whole event as JSON data.
 */
export function encodeEvent(event: SseEvent): Uint8Array {
  return encoder.encode(
    `event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`,
  );
}
