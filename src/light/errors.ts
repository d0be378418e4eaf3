/**
 * Light Module - Error Types
 *
 * @see ../mesh/errors.ts for the bus-level errors wrapped here
 */
import { type MeshError, formatMeshError } from "../mesh/index.js";

export type LightError =
  | {
      readonly type: "UNKNOWN_LIGHT";
      readonly message: string;
      readonly uniqueId: string;
    }
  | {
      readonly type: "COMMAND_FAILED";
      readonly message: string;
      readonly cause: MeshError;
    };

// =============================================================================
// Error Factory Functions
// =============================================================================

export function unknownLight(uniqueId: string): LightError {
  return {
    type: "UNKNOWN_LIGHT",
    message: `No light with id ${uniqueId}`,
    uniqueId,
  };
}

export function commandFailed(cause: MeshError): LightError {
  return { type: "COMMAND_FAILED", message: formatMeshError(cause), cause };
}

/**
 * Format a LightError for logging.
 */
export function formatLightError(error: LightError): string {
  switch (error.type) {
    case "UNKNOWN_LIGHT":
      return `Unknown light: ${error.uniqueId}`;
    case "COMMAND_FAILED":
      return `Light command failed: ${error.message}`;
  }
}
