/**
 * Light Module - Service Layer
 *
 * Tracks one entity per discovered light and group, derives entity state
 * from the coordinator's registry, and turns entity commands into bus
 * commands followed by an optimistic status update.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type {
  DeviceKind,
  MeshCoordinator,
  MeshError,
  Unsubscribe,
} from "../mesh/index.js";
import { DEVICE_KINDS } from "../mesh/index.js";
import {
  type LightError,
  commandFailed,
  formatLightError,
  unknownLight,
} from "./errors.js";
import type {
  ColorMode,
  LightCommand,
  LightPlan,
  LightState,
  TurnOnRequest,
} from "./schema.js";
import {
  defaultColorMode,
  deriveLightState,
  lightUniqueId,
  planTurnOff,
  planTurnOn,
  supportedColorModes,
} from "./transform.js";

const log = createLogger("light");

type TrackedLight = {
  readonly uniqueId: string;
  readonly kind: DeviceKind;
  readonly name: string;
  colorMode: ColorMode;
};

/**
 * Called with the lights that appeared since the last registry change.
 */
export type LightsAddedHandler = (lights: readonly LightState[]) => void;

export class LightTracker {
  private readonly entities = new Map<string, TrackedLight>();
  private readonly unsubscribe: Unsubscribe;

  constructor(
    private readonly coordinator: MeshCoordinator,
    private readonly entryId: string,
    private readonly onAdded?: LightsAddedHandler,
  ) {
    this.sync();
    this.unsubscribe = coordinator.subscribe(() => {
      this.sync();
    });
  }

  /**
   * Start tracking lights, then groups, that are not tracked yet.
   *
   * @returns the newly tracked lights
   */
  sync(): LightState[] {
    const added: LightState[] = [];

    for (const kind of DEVICE_KINDS) {
      const records =
        kind === "lights" ? this.coordinator.lights : this.coordinator.groups;

      for (const record of records.values()) {
        const uniqueId = lightUniqueId(this.entryId, kind, record.name);
        if (this.entities.has(uniqueId)) continue;

        const entity: TrackedLight = {
          uniqueId,
          kind,
          name: record.name,
          colorMode: defaultColorMode(supportedColorModes(record.capabilities)),
        };
        this.entities.set(uniqueId, entity);

        const state = this.stateOf(entity);
        if (state) added.push(state);
      }
    }

    if (added.length > 0) {
      log.info(
        { lights: added.map((light) => light.uniqueId) },
        "Tracking new lights",
      );
      this.onAdded?.(added);
    }

    return added;
  }

  list(): LightState[] {
    const states: LightState[] = [];
    for (const entity of this.entities.values()) {
      const state = this.stateOf(entity);
      if (state) states.push(state);
    }
    return states;
  }

  get(uniqueId: string): LightState | null {
    const entity = this.entities.get(uniqueId);
    return entity ? this.stateOf(entity) : null;
  }

  async turnOn(
    uniqueId: string,
    request: TurnOnRequest = {},
  ): Promise<Result<LightState, LightError>> {
    const entity = this.entities.get(uniqueId);
    const record = entity
      ? this.coordinator.getDevice(entity.kind, entity.name)
      : null;
    if (!entity || !record) {
      return err(unknownLight(uniqueId));
    }

    return this.execute(
      entity,
      planTurnOn(supportedColorModes(record.capabilities), request),
    );
  }

  async turnOff(uniqueId: string): Promise<Result<LightState, LightError>> {
    const entity = this.entities.get(uniqueId);
    if (!entity) {
      return err(unknownLight(uniqueId));
    }

    return this.execute(entity, planTurnOff());
  }

  /**
   * Stop following registry changes.
   */
  dispose(): void {
    this.unsubscribe();
  }

  private async execute(
    entity: TrackedLight,
    plan: LightPlan,
  ): Promise<Result<LightState, LightError>> {
    const sent = await this.send(entity, plan.command);
    if (sent.isErr()) {
      const error = commandFailed(sent.error);
      log.error(
        { uniqueId: entity.uniqueId, command: plan.command.type },
        formatLightError(error),
      );
      return err(error);
    }

    if (plan.colorMode) {
      entity.colorMode = plan.colorMode;
    }

    const applied = this.coordinator.applyOptimisticStatus(
      entity.kind,
      entity.name,
      plan.optimistic,
    );
    if (applied.isErr()) {
      return err(unknownLight(entity.uniqueId));
    }

    log.info(
      { uniqueId: entity.uniqueId, command: plan.command },
      "Light command sent",
    );

    const state = this.stateOf(entity);
    return state ? ok(state) : err(unknownLight(entity.uniqueId));
  }

  private send(
    entity: TrackedLight,
    command: LightCommand,
  ): Promise<Result<void, MeshError>> {
    const { kind, name } = entity;

    switch (command.type) {
      case "power":
        return this.coordinator.setPower(kind, name, command.on);
      case "lightness":
        return this.coordinator.setLightness(kind, name, command.lightness);
      case "hsl":
        return this.coordinator.setHsl(
          kind,
          name,
          command.hue,
          command.saturation,
          command.lightness,
        );
      case "ctl":
        return this.coordinator.setCtl(
          kind,
          name,
          command.temperature,
          command.lightness,
        );
    }
  }

  private stateOf(entity: TrackedLight): LightState | null {
    const record = this.coordinator.getDevice(entity.kind, entity.name);
    if (!record) return null;

    return deriveLightState(
      entity.uniqueId,
      record,
      this.coordinator.available(),
      entity.colorMode,
    );
  }
}
