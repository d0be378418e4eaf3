/**
 * Light Module - Public API
 *
 * Exports only what's needed by other modules.
 */

// Types
export type {
  ColorMode,
  LightCommand,
  LightPlan,
  LightState,
  TurnOnRequest,
} from "./schema.js";
export type { LightError } from "./errors.js";
export type { LightsAddedHandler } from "./service.js";

export { MAX_MIREDS, MIN_MIREDS, TurnOnRequestSchema } from "./schema.js";

// Error utilities
export { formatLightError } from "./errors.js";

// Service
export { LightTracker } from "./service.js";

// Pure transformations
export {
  deriveLightState,
  kelvinToMired,
  lightUniqueId,
  miredToKelvin,
  parseOnOff,
  planTurnOff,
  planTurnOn,
} from "./transform.js";
