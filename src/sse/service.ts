/**
 * SSE Module - Service Layer
 *
 * Keeps the open event streams and pushes registry snapshots to them.
 * Every stream starts with the snapshot current when it was opened.
 */
import { createLogger } from "../logger.js";
import type { RegistryEvent } from "./schema.js";
import { encodeEvent } from "./transform.js";

const log = createLogger("sse");

type StreamController = ReadableStreamDefaultController<Uint8Array>;

/** clientId -> stream controller */
const clients = new Map<number, StreamController>();
let nextClientId = 1;

export function getClientCount(): number {
  return clients.size;
}

/**
 * Open a stream for a new client, primed with the given snapshot.
 */
export function createSseStream(snapshot: RegistryEvent): {
  stream: ReadableStream<Uint8Array>;
  clientId: number;
} {
  const clientId = nextClientId++;

  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      clients.set(clientId, controller);
      controller.enqueue(encodeEvent(snapshot));
      log.info(
        { clientId, totalClients: clients.size },
        "SSE client connected",
      );
    },
    cancel() {
      removeClient(clientId);
    },
  });

  return { stream, clientId };
}

/**
 * Forget a client. Called on cancel and on request abort, so either may
 * come second.
 */
export function removeClient(clientId: number): void {
  if (!clients.delete(clientId)) return;

  log.info(
    { clientId, remainingClients: clients.size },
    "SSE client disconnected",
  );
}

/**
 * Send a registry snapshot to every open stream. Streams that can no
 * longer take data are dropped.
 */
export function broadcastRegistry(snapshot: RegistryEvent): void {
  if (clients.size === 0) return;

  const frame = encodeEvent(snapshot);
  for (const [clientId, controller] of clients) {
    try {
      controller.enqueue(frame);
    } catch (error) {
      clients.delete(clientId);
      log.debug({ clientId, error }, "Dropped SSE client with a closed stream");
    }
  }

  log.debug(
    { clients: clients.size, lights: snapshot.lights.length },
    "Registry snapshot broadcast",
  );
}

/**
 * Close every stream (for shutdown).
 */
export function disconnectAllClients(): void {
  log.info({ clientCount: clients.size }, "Disconnecting all SSE clients");

  for (const [clientId, controller] of clients) {
    try {
      controller.close();
    } catch (error) {
      log.debug({ clientId, error }, "SSE stream already closed");
    }
  }

  clients.clear();
}
