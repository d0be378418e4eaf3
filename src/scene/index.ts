/**
 * Scene Module - Public API
 */

// Types
export type { SceneState } from "./schema.js";
export type { SceneError } from "./errors.js";
export type { ScenesAddedHandler } from "./service.js";

// Error utilities
export { formatSceneError } from "./errors.js";

// Service
export { SceneTracker } from "./service.js";

// Pure transformations
export { sceneUniqueId, toSceneState } from "./transform.js";
