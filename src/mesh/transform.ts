/**
 * Mesh Module - Pure Transformations
 *
 * Topic routing, payload validation, registry record construction and
 * outbound command encoding.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";
import type { ZodError } from "zod";

import { type MeshError, invalidJson, invalidPayload } from "./errors.js";
import type {
  DeviceDescriptor,
  DeviceKind,
  DeviceRecord,
  DeviceStatus,
  InboundMessage,
  LightCapability,
  OutboundMessage,
  RawMessage,
  SceneDescriptor,
  SceneRecord,
} from "./schema.js";
import {
  DeviceDescriptorSchema,
  DiscoveryPayloadSchema,
  SceneDescriptorSchema,
  StatusPayloadSchema,
} from "./schema.js";

// =============================================================================
// Topics
// =============================================================================

/**
 * Topics the coordinator subscribes to under the gateway root.
 * `+` matches exactly one topic level.
 */
export function subscriptionTopics(root: string): string[] {
  return [
    `${root}/lights`,
    `${root}/groups`,
    `${root}/scenes`,
    `${root}/lights/+/status`,
    `${root}/groups/+/status`,
  ];
}

/**
 * Where an inbound topic is routed.
 */
export type TopicRoute =
  | Readonly<{ type: "deviceDiscovery"; kind: DeviceKind }>
  | Readonly<{ type: "sceneDiscovery" }>
  | Readonly<{ type: "status"; kind: DeviceKind; name: string }>
  | Readonly<{ type: "ignored" }>;

/**
 * Classify a topic. Discovery topics match exactly; any topic with a
 * `status` level is a status update for the level after `lights` (or,
 * failing that, `groups`).
 */
export function classifyTopic(root: string, topic: string): TopicRoute {
  if (topic === `${root}/lights`) {
    return { type: "deviceDiscovery", kind: "lights" };
  }
  if (topic === `${root}/groups`) {
    return { type: "deviceDiscovery", kind: "groups" };
  }
  if (topic === `${root}/scenes`) {
    return { type: "sceneDiscovery" };
  }

  const segments = topic.split("/");
  if (!segments.includes("status")) {
    return { type: "ignored" };
  }

  const kind: DeviceKind | null = segments.includes("lights")
    ? "lights"
    : segments.includes("groups")
      ? "groups"
      : null;
  if (!kind) {
    return { type: "ignored" };
  }

  const name = segments[segments.indexOf(kind) + 1];
  if (name === undefined || name === "") {
    return { type: "ignored" };
  }

  return { type: "status", kind, name };
}

// =============================================================================
// Payload Parsing
// =============================================================================

/**
 * Decode a JSON payload. An empty payload decodes to null.
 */
export function parseJsonPayload(
  topic: string,
  payload: string,
): Result<unknown, MeshError> {
  if (payload === "") {
    return ok(null);
  }

  try {
    const value: unknown = JSON.parse(payload);
    return ok(value);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(invalidJson(topic, message));
  }
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
}

/**
 * Keep the entries that are valid descriptors; entries without a
 * non-empty name are skipped.
 */
function collectDescriptors<T>(
  entries: readonly unknown[],
  parse: (entry: unknown) => { success: true; data: T } | { success: false },
): T[] {
  const descriptors: T[] = [];
  for (const entry of entries) {
    const parsed = parse(entry);
    if (parsed.success) {
      descriptors.push(parsed.data);
    }
  }
  return descriptors;
}

/**
 * Parse and validate a raw inbound message into its routed variant.
 *
 * The payload is decoded before routing, so malformed JSON is rejected on
 * every topic, including ones that would otherwise be ignored.
 */
export function parseInboundMessage(
  root: string,
  message: RawMessage,
): Result<InboundMessage, MeshError> {
  const { topic } = message;

  return parseJsonPayload(topic, message.payload).andThen(
    (data): Result<InboundMessage, MeshError> => {
      const route = classifyTopic(root, topic);

      switch (route.type) {
        case "deviceDiscovery": {
          const parsed = DiscoveryPayloadSchema.safeParse(data);
          if (!parsed.success) {
            return err(invalidPayload(topic, formatIssues(parsed.error)));
          }
          const devices =
            parsed.data === null
              ? null
              : collectDescriptors<DeviceDescriptor>(parsed.data, (entry) =>
                  DeviceDescriptorSchema.safeParse(entry),
                );
          return ok({ type: "deviceDiscovery", kind: route.kind, devices });
        }

        case "sceneDiscovery": {
          const parsed = DiscoveryPayloadSchema.safeParse(data);
          if (!parsed.success) {
            return err(invalidPayload(topic, formatIssues(parsed.error)));
          }
          const scenes =
            parsed.data === null
              ? null
              : collectDescriptors<SceneDescriptor>(parsed.data, (entry) =>
                  SceneDescriptorSchema.safeParse(entry),
                );
          return ok({ type: "sceneDiscovery", scenes });
        }

        case "status": {
          const parsed = StatusPayloadSchema.safeParse(data);
          if (!parsed.success) {
            return err(invalidPayload(topic, formatIssues(parsed.error)));
          }
          return ok({
            type: "status",
            kind: route.kind,
            name: route.name,
            status: parsed.data,
          });
        }

        case "ignored":
          return ok({ type: "ignored" });
      }
    },
  );
}

// =============================================================================
// Registry Records
// =============================================================================

/**
 * Capabilities declared by a descriptor. Any truthy support flag counts.
 */
export function deriveCapabilities(
  descriptor: DeviceDescriptor,
): LightCapability[] {
  const capabilities: LightCapability[] = ["brightness"];

  if (descriptor.supportsColorTemperature || descriptor.supports_ctl) {
    capabilities.push("color_temp");
  }
  if (descriptor.supportsColor || descriptor.supports_hsl) {
    capabilities.push("hs");
  }

  return capabilities;
}

/**
 * Build a fresh registry record from a discovery descriptor.
 * Status starts out unknown.
 */
export function toDeviceRecord(
  kind: DeviceKind,
  descriptor: DeviceDescriptor,
): DeviceRecord {
  return {
    name: descriptor.name,
    kind,
    model: typeof descriptor.model === "string" ? descriptor.model : null,
    capabilities: deriveCapabilities(descriptor),
    metadata: { ...descriptor },
    status: null,
  };
}

export function toSceneRecord(descriptor: SceneDescriptor): SceneRecord {
  return {
    name: descriptor.name,
    metadata: { ...descriptor },
  };
}

/**
 * Merge status fields over the current status.
 * Fields absent from the patch keep their previous value.
 */
export function mergeStatus(
  current: Readonly<DeviceStatus> | null,
  patch: Readonly<Partial<DeviceStatus>>,
): DeviceStatus {
  const merged: DeviceStatus = { ...current };
  for (const [key, value] of Object.entries(patch)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}

/**
 * Return a copy of the record carrying the merged status.
 */
export function withStatus(
  record: DeviceRecord,
  patch: Readonly<Partial<DeviceStatus>>,
): DeviceRecord {
  return { ...record, status: mergeStatus(record.status, patch) };
}

// =============================================================================
// Outbound Commands
// =============================================================================

/**
 * Power command. `onOff` is always sent as "on"/"off", never as a boolean.
 */
export function buildPowerCommand(
  root: string,
  kind: DeviceKind,
  name: string,
  on: boolean,
): OutboundMessage {
  return {
    topic: `${root}/${kind}/${name}/power`,
    payload: { onOff: on ? "on" : "off" },
  };
}

export function buildLightnessCommand(
  root: string,
  kind: DeviceKind,
  name: string,
  lightness: number,
): OutboundMessage {
  return {
    topic: `${root}/${kind}/${name}/lightness`,
    payload: { lightness },
  };
}

export function buildHslCommand(
  root: string,
  kind: DeviceKind,
  name: string,
  hue: number,
  saturation: number,
  lightness: number,
): OutboundMessage {
  return {
    topic: `${root}/${kind}/${name}/hsl`,
    payload: { hue, saturation, lightness },
  };
}

export function buildCtlCommand(
  root: string,
  kind: DeviceKind,
  name: string,
  temperature: number,
  lightness: number,
): OutboundMessage {
  return {
    topic: `${root}/${kind}/${name}/ctl`,
    payload: { temperature, lightness },
  };
}

/**
 * Scene recall. Targeted when both target parts are given, global otherwise.
 * The payload is the bare scene name.
 */
export function buildRecallSceneCommand(
  root: string,
  sceneName: string,
  targetKind?: DeviceKind,
  targetName?: string,
): OutboundMessage {
  const topic =
    targetKind && targetName
      ? `${root}/${targetKind}/${targetName}/recallScene`
      : `${root}/scenes/recallScene`;

  return { topic, payload: sceneName };
}

/**
 * Encode an outbound payload for the wire.
 */
export function encodePayload(payload: OutboundMessage["payload"]): string {
  return typeof payload === "string" ? payload : JSON.stringify(payload);
}
