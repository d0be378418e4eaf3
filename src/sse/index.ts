/**
 * SSE Module - Public API
 */

// Types
export type { RegistryEvent, SseEvent } from "./schema.js";

// Pure transformations
export { encodeEvent, toRegistryEvent } from "./transform.js";

// Service functions
export {
  broadcastRegistry,
  createSseStream,
  disconnectAllClients,
  getClientCount,
  removeClient,
} from "./service.js";
