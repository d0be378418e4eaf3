/**
 * Mesh Module - Public API
 *
 * Exports the coordinator, its types, and the pure transformations.
 */

// Types
export type {
  Credentials,
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
export type { MeshError } from "./errors.js";
export type {
  MeshCoordinatorOptions,
  MeshObserver,
  Unsubscribe,
} from "./service.js";

export { DEVICE_KINDS } from "./schema.js";

// Error utilities
export { formatMeshError } from "./errors.js";

// Coordinator
export { MeshCoordinator } from "./service.js";

// Pure transformations
export type { TopicRoute } from "./transform.js";

export {
  buildCtlCommand,
  buildHslCommand,
  buildLightnessCommand,
  buildPowerCommand,
  buildRecallSceneCommand,
  classifyTopic,
  deriveCapabilities,
  encodePayload,
  mergeStatus,
  parseInboundMessage,
  subscriptionTopics,
} from "./transform.js";
