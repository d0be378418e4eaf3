/**
 * Mesh Module - Schemas and Types
 *
 * Data shapes for gateway discovery and status messages, the device
 * registry, and inbound message variants.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Collections
// =============================================================================

/**
 * Addressable collections. Used verbatim as a topic segment.
 */
export type DeviceKind = "lights" | "groups";

export const DEVICE_KINDS: readonly DeviceKind[] = ["lights", "groups"];

/**
 * Capabilities derived from a discovery descriptor.
 * `brightness` is always present.
 */
export type LightCapability = "brightness" | "color_temp" | "hs";

// =============================================================================
// Discovery Descriptors
// =============================================================================

/**
 * Light or group descriptor from `<root>/lights` and `<root>/groups`.
 * Both camelCase and snake_case support flags occur in the wild.
 * Unknown fields are kept as metadata.
 */
export const DeviceDescriptorSchema = z
  .object({
    name: z.string().min(1).describe("Unique device or group name"),
    supportsColorTemperature: z.unknown().optional(),
    supports_ctl: z.unknown().optional(),
    supportsColor: z.unknown().optional(),
    supports_hsl: z.unknown().optional(),
    model: z.unknown().optional().describe("Model name"),
  })
  .passthrough();

export type DeviceDescriptor = z.infer<typeof DeviceDescriptorSchema>;

/**
 * Scene descriptor from `<root>/scenes`.
 */
export const SceneDescriptorSchema = z
  .object({
    name: z.string().min(1).describe("Unique scene name"),
  })
  .passthrough();

export type SceneDescriptor = z.infer<typeof SceneDescriptorSchema>;

/**
 * Discovery payload: a list of descriptors, or null for an empty payload.
 * Entries are validated one by one so that a bad entry does not sink the list.
 */
export const DiscoveryPayloadSchema = z.array(z.unknown()).nullable();

// =============================================================================
// Status
// =============================================================================

/**
 * Status fields published on `<root>/<kind>/<name>/status`.
 * `onOff` arrives as boolean or "on"/"off".
 */
export const DeviceStatusSchema = z
  .object({
    onOff: z.union([z.boolean(), z.string()]).optional(),
    lightness: z.number().optional().describe("0.0 - 1.0"),
    hue: z.number().optional().describe("Degrees 0 - 360"),
    saturation: z.number().optional().describe("0.0 - 1.0"),
    temperature: z.number().optional().describe("Kelvin"),
  })
  .passthrough();

export type DeviceStatus = z.infer<typeof DeviceStatusSchema>;

export const StatusPayloadSchema = DeviceStatusSchema.nullable();

// =============================================================================
// Registry
// =============================================================================

/**
 * A discovered light or group.
 */
export type DeviceRecord = Readonly<{
  name: string;
  kind: DeviceKind;
  model: string | null;
  capabilities: readonly LightCapability[];
  metadata: Readonly<Record<string, unknown>>;
  status: Readonly<DeviceStatus> | null;
}>;

/**
 * A discovered scene.
 */
export type SceneRecord = Readonly<{
  name: string;
  metadata: Readonly<Record<string, unknown>>;
}>;

export type Credentials = Readonly<{
  username: string;
  password: string;
}>;

// =============================================================================
// Inbound Messages
// =============================================================================

/**
 * Raw message as handed over by the MQTT client.
 */
export type RawMessage = Readonly<{
  topic: string;
  payload: string;
}>;

/**
 * A validated inbound message. One routing decision per message.
 */
export type InboundMessage =
  | Readonly<{
      type: "deviceDiscovery";
      kind: DeviceKind;
      devices: readonly DeviceDescriptor[] | null;
    }>
  | Readonly<{
      type: "sceneDiscovery";
      scenes: readonly SceneDescriptor[] | null;
    }>
  | Readonly<{
      type: "status";
      kind: DeviceKind;
      name: string;
      status: DeviceStatus | null;
    }>
  | Readonly<{ type: "ignored" }>;

// =============================================================================
// Outbound Commands
// =============================================================================

/**
 * A topic/payload pair ready to publish.
 * Objects are JSON-encoded; strings go out as-is.
 */
export type OutboundMessage = Readonly<{
  topic: string;
  payload: string | Readonly<Record<string, unknown>>;
}>;
