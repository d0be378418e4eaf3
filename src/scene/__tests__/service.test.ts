/**
 * Scene Module - Service Tests
 */
import { ok } from "neverthrow";
import { beforeEach, describe, expect, it, vi } from "vitest";

import { MeshCoordinator } from "../../mesh/index.js";
import { SceneTracker } from "../service.js";
import { sceneUniqueId } from "../transform.js";

const ROOT = "haefele/gateway";

function discoverScenes(coordinator: MeshCoordinator, names: string[]) {
  coordinator.handleMessage({
    topic: `${ROOT}/scenes`,
    payload: JSON.stringify(names.map((name) => ({ name }))),
  });
}

describe("sceneUniqueId", () => {
  it("prefixes the scene name with the entry id", () => {
    expect(sceneUniqueId("entry", "Evening")).toBe("entry_scene_Evening");
  });

  it("replaces slashes from the entry id", () => {
    expect(sceneUniqueId("localhost_haefele/gateway", "Evening")).toBe(
      "localhost_haefele_gateway_scene_Evening",
    );
  });
});

describe("SceneTracker", () => {
  let coordinator: MeshCoordinator;

  beforeEach(() => {
    coordinator = new MeshCoordinator({ gatewayTopic: ROOT });
  });

  it("tracks scenes as they are discovered", () => {
    const onAdded = vi.fn();
    const tracker = new SceneTracker(coordinator, "entry", onAdded);

    discoverScenes(coordinator, ["Evening", "Morning"]);
    discoverScenes(coordinator, ["Evening"]);

    expect(onAdded).toHaveBeenCalledTimes(1);
    expect(tracker.list()).toEqual([
      { uniqueId: "entry_scene_Evening", name: "Evening", available: false },
      { uniqueId: "entry_scene_Morning", name: "Morning", available: false },
    ]);
  });

  it("recalls the scene globally on activate", async () => {
    discoverScenes(coordinator, ["Evening"]);
    const tracker = new SceneTracker(coordinator, "entry");
    const recall = vi
      .spyOn(coordinator, "recallScene")
      .mockResolvedValue(ok(undefined));

    const result = await tracker.activate("entry_scene_Evening");

    expect(recall).toHaveBeenCalledWith("Evening");
    expect(result.isOk()).toBe(true);
  });

  it("reports a failed recall", async () => {
    discoverScenes(coordinator, ["Evening"]);
    const tracker = new SceneTracker(coordinator, "entry");

    const result = await tracker.activate("entry_scene_Evening");

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe("COMMAND_FAILED");
      expect(result.error.message).toContain("MQTT client not connected");
    }
  });

  it("rejects unknown scene ids", async () => {
    const tracker = new SceneTracker(coordinator, "entry");
    const recall = vi.spyOn(coordinator, "recallScene");

    const result = await tracker.activate("entry_scene_Night");

    expect(result.isErr() && result.error.type).toBe("UNKNOWN_SCENE");
    expect(recall).not.toHaveBeenCalled();
  });

  it("stops following the registry after dispose", () => {
    const tracker = new SceneTracker(coordinator, "entry");
    tracker.dispose();

    discoverScenes(coordinator, ["Evening"]);

    expect(tracker.list()).toEqual([]);
  });
});
