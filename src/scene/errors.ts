/**
 * Scene Module - Error Types
 */
import { type MeshError, formatMeshError } from "../mesh/index.js";

export type SceneError =
  | {
      readonly type: "UNKNOWN_SCENE";
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

export function unknownScene(uniqueId: string): SceneError {
  return {
    type: "UNKNOWN_SCENE",
    message: `No scene with id ${uniqueId}`,
    uniqueId,
  };
}

export function commandFailed(cause: MeshError): SceneError {
  return { type: "COMMAND_FAILED", message: formatMeshError(cause), cause };
}

export function formatSceneError(error: SceneError): string {
  switch (error.type) {
    case "UNKNOWN_SCENE":
      return `Unknown scene: ${error.uniqueId}`;
    case "COMMAND_FAILED":
      return `Scene recall failed: ${error.message}`;
  }
}
