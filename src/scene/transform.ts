/**
 * Scene Module - Pure Transformations
 */
import type { SceneRecord } from "../mesh/index.js";
import type { SceneState } from "./schema.js";

/** Slashes become underscores, as in light ids. */
export function sceneUniqueId(entryId: string, name: string): string {
  return `${entryId}_scene_${name}`.replaceAll("/", "_");
}

export function toSceneState(
  uniqueId: string,
  record: SceneRecord,
  available: boolean,
): SceneState {
  return { uniqueId, name: record.name, available };
}
