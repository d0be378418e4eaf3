/**
 * SSE Service Tests
 *
 * Tests stream management and registry snapshots.
 */
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import type { LightState } from "../../light/index.js";

// Mock logger
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

// Import after mocks
import {
  broadcastRegistry,
  createSseStream,
  disconnectAllClients,
  getClientCount,
  removeClient,
} from "../service.js";
import { encodeEvent, toRegistryEvent } from "../transform.js";

const decoder = new TextDecoder();

const kitchen: LightState = {
  uniqueId: "entry_lights_Kitchen",
  name: "Kitchen",
  kind: "lights",
  model: null,
  available: true,
  isOn: true,
  brightness: 255,
  hsColor: null,
  colorTemp: null,
  colorMode: "brightness",
  supportedColorModes: ["brightness"],
  minMireds: 50,
  maxMireds: 1250,
};

const EMPTY = toRegistryEvent(false, [], []);
const EMPTY_FRAME =
  'event: registry\ndata: {"type":"registry","connected":false,"lights":[],"scenes":[]}\n\n';

describe("SSE transform", () => {
  test("encodes an event as one frame", () => {
    expect(decoder.decode(encodeEvent(EMPTY))).toBe(EMPTY_FRAME);
  });
});

describe("SSE Service", () => {
  beforeEach(() => {
    disconnectAllClients();
  });

  afterEach(() => {
    disconnectAllClients();
  });

  // ===========================================================================
  // Client Management
  // ===========================================================================

  describe("getClientCount", () => {
    test("returns 0 when no clients connected", () => {
      expect(getClientCount()).toBe(0);
    });

    test("counts open streams", () => {
      createSseStream(EMPTY);
      createSseStream(EMPTY);
      createSseStream(EMPTY);

      expect(getClientCount()).toBe(3);
    });
  });

  describe("createSseStream", () => {
    test("increments client ID for each new client", () => {
      const client1 = createSseStream(EMPTY);
      const client2 = createSseStream(EMPTY);

      expect(client1.stream).toBeInstanceOf(ReadableStream);
      expect(client2.clientId).toBeGreaterThan(client1.clientId);
    });

    test("opens with the given snapshot", async () => {
      const { stream } = createSseStream(EMPTY);
      const reader = stream.getReader();

      const { value, done } = await reader.read();
      reader.releaseLock();

      expect(done).toBe(false);
      expect(decoder.decode(value)).toBe(EMPTY_FRAME);
    });

    test("forgets the client when the stream is cancelled", async () => {
      const { stream } = createSseStream(EMPTY);
      expect(getClientCount()).toBe(1);

      await stream.cancel();

      expect(getClientCount()).toBe(0);
    });
  });

  describe("removeClient", () => {
    test("removes client by ID", () => {
      const { clientId } = createSseStream(EMPTY);
      expect(getClientCount()).toBe(1);

      removeClient(clientId);
      expect(getClientCount()).toBe(0);
    });

    test("does nothing for non-existent client ID", () => {
      createSseStream(EMPTY);

      removeClient(99999);
      expect(getClientCount()).toBe(1);
    });
  });

  describe("disconnectAllClients", () => {
    test("closes every stream", async () => {
      const reader = createSseStream(EMPTY).stream.getReader();
      createSseStream(EMPTY);
      expect(getClientCount()).toBe(2);

      disconnectAllClients();

      expect(getClientCount()).toBe(0);
      await reader.read();
      expect((await reader.read()).done).toBe(true);
    });
  });

  // ===========================================================================
  // Broadcasting
  // ===========================================================================

  describe("broadcastRegistry", () => {
    test("sends the snapshot to all open streams", async () => {
      const reader1 = createSseStream(EMPTY).stream.getReader();
      const reader2 = createSseStream(EMPTY).stream.getReader();
      await reader1.read();
      await reader2.read();

      broadcastRegistry(toRegistryEvent(true, [], []));

      const expected =
        'event: registry\ndata: {"type":"registry","connected":true,"lights":[],"scenes":[]}\n\n';
      expect(decoder.decode((await reader1.read()).value)).toBe(expected);
      expect(decoder.decode((await reader2.read()).value)).toBe(expected);

      reader1.releaseLock();
      reader2.releaseLock();
    });

    test("carries light and scene states", async () => {
      const reader = createSseStream(EMPTY).stream.getReader();
      await reader.read();

      broadcastRegistry(
        toRegistryEvent(
          true,
          [kitchen],
          [{ uniqueId: "entry_scene_Evening", name: "Evening", available: true }],
        ),
      );

      const text = decoder.decode((await reader.read()).value);
      const [eventLine, dataLine] = text.split("\n");
      expect(eventLine).toBe("event: registry");
      expect(JSON.parse(dataLine?.slice("data: ".length) ?? "")).toEqual({
        type: "registry",
        connected: true,
        lights: [kitchen],
        scenes: [
          { uniqueId: "entry_scene_Evening", name: "Evening", available: true },
        ],
      });

      reader.releaseLock();
    });

    test("does nothing when no clients connected", () => {
      expect(() => {
        broadcastRegistry(EMPTY);
      }).not.toThrow();
    });
  });
});
