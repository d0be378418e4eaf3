/**
 * Scene Module - Service Layer
 *
 * One entity per discovered scene. Activation recalls the scene on every
 * device of the mesh.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { MeshCoordinator, Unsubscribe } from "../mesh/index.js";
import {
  type SceneError,
  commandFailed,
  formatSceneError,
  unknownScene,
} from "./errors.js";
import type { SceneState } from "./schema.js";
import { sceneUniqueId, toSceneState } from "./transform.js";

const log = createLogger("scene");

export type ScenesAddedHandler = (scenes: readonly SceneState[]) => void;

export class SceneTracker {
  /** uniqueId -> scene name */
  private readonly entities = new Map<string, string>();
  private readonly unsubscribe: Unsubscribe;

  constructor(
    private readonly coordinator: MeshCoordinator,
    private readonly entryId: string,
    private readonly onAdded?: ScenesAddedHandler,
  ) {
    this.sync();
    this.unsubscribe = coordinator.subscribe(() => {
      this.sync();
    });
  }

  sync(): SceneState[] {
    const added: SceneState[] = [];

    for (const record of this.coordinator.scenes.values()) {
      const uniqueId = sceneUniqueId(this.entryId, record.name);
      if (this.entities.has(uniqueId)) continue;

      this.entities.set(uniqueId, record.name);
      added.push(toSceneState(uniqueId, record, this.coordinator.available()));
    }

    if (added.length > 0) {
      log.info(
        { scenes: added.map((scene) => scene.uniqueId) },
        "Tracking new scenes",
      );
      this.onAdded?.(added);
    }

    return added;
  }

  list(): SceneState[] {
    const states: SceneState[] = [];
    for (const uniqueId of this.entities.keys()) {
      const state = this.get(uniqueId);
      if (state) states.push(state);
    }
    return states;
  }

  get(uniqueId: string): SceneState | null {
    const name = this.entities.get(uniqueId);
    const record =
      name === undefined ? undefined : this.coordinator.scenes.get(name);
    if (!record) return null;

    return toSceneState(uniqueId, record, this.coordinator.available());
  }

  async activate(uniqueId: string): Promise<Result<SceneState, SceneError>> {
    const state = this.get(uniqueId);
    if (!state) {
      return err(unknownScene(uniqueId));
    }

    const sent = await this.coordinator.recallScene(state.name);
    if (sent.isErr()) {
      const error = commandFailed(sent.error);
      log.error({ uniqueId }, formatSceneError(error));
      return err(error);
    }

    log.info({ uniqueId, scene: state.name }, "Scene recalled");
    return ok(state);
  }

  dispose(): void {
    this.unsubscribe();
  }
}
