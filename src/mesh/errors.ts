/**
 * Mesh Module - Error Types
 *
 * Typed error union for bus and registry operations.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while talking to the gateway.
 */
export type MeshError =
  | {
      readonly type: "CONNECTION_FAILED";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "SUBSCRIBE_FAILED";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "NOT_CONNECTED";
      readonly message: string;
      readonly topic: string;
    }
  | {
      readonly type: "PUBLISH_FAILED";
      readonly message: string;
      readonly topic: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "DISCONNECT_FAILED";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "INVALID_JSON";
      readonly message: string;
      readonly topic: string;
    }
  | {
      readonly type: "INVALID_PAYLOAD";
      readonly message: string;
      readonly topic: string;
    }
  | {
      readonly type: "UNKNOWN_DEVICE";
      readonly message: string;
      readonly name: string;
    };

// =============================================================================
// Error Factory Functions
// =============================================================================

export function connectionFailed(message: string, cause?: Error): MeshError {
  return cause !== undefined
    ? { type: "CONNECTION_FAILED", message, cause }
    : { type: "CONNECTION_FAILED", message };
}

export function subscribeFailed(message: string, cause?: Error): MeshError {
  return cause !== undefined
    ? { type: "SUBSCRIBE_FAILED", message, cause }
    : { type: "SUBSCRIBE_FAILED", message };
}

export function notConnected(topic: string): MeshError {
  return { type: "NOT_CONNECTED", message: "MQTT client not connected", topic };
}

export function publishFailed(
  topic: string,
  message: string,
  cause?: Error,
): MeshError {
  return cause !== undefined
    ? { type: "PUBLISH_FAILED", message, topic, cause }
    : { type: "PUBLISH_FAILED", message, topic };
}

export function disconnectFailed(message: string, cause?: Error): MeshError {
  return cause !== undefined
    ? { type: "DISCONNECT_FAILED", message, cause }
    : { type: "DISCONNECT_FAILED", message };
}

export function invalidJson(topic: string, message: string): MeshError {
  return { type: "INVALID_JSON", message, topic };
}

export function invalidPayload(topic: string, message: string): MeshError {
  return { type: "INVALID_PAYLOAD", message, topic };
}

export function unknownDevice(name: string): MeshError {
  return { type: "UNKNOWN_DEVICE", message: `No device named ${name}`, name };
}

/**
 * Normalize a thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Format a MeshError for logging.
 */
export function formatMeshError(error: MeshError): string {
  switch (error.type) {
    case "CONNECTION_FAILED":
      return `MQTT connection failed: ${error.message}`;
    case "SUBSCRIBE_FAILED":
      return `MQTT subscribe failed: ${error.message}`;
    case "NOT_CONNECTED":
      return `Cannot publish to ${error.topic}: ${error.message}`;
    case "PUBLISH_FAILED":
      return `Publish to ${error.topic} failed: ${error.message}`;
    case "DISCONNECT_FAILED":
      return `MQTT disconnect failed: ${error.message}`;
    case "INVALID_JSON":
      return `Invalid JSON on ${error.topic}: ${error.message}`;
    case "INVALID_PAYLOAD":
      return `Unexpected payload on ${error.topic}: ${error.message}`;
    case "UNKNOWN_DEVICE":
      return `Unknown device: ${error.message}`;
  }
}
