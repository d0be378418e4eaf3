/**
 * Mesh Module - Service Layer
 *
 * The coordinator owns the MQTT connection to the gateway, the registry of
 * discovered lights, groups and scenes, and the observers that re-read the
 * registry when it changes. Outbound commands are encoded here and
 * published fire-and-forget.
 */
import mqtt from "mqtt";
import type { IClientOptions, MqttClient } from "mqtt";
import { type Result, ResultAsync, err, ok } from "neverthrow";

import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  type MeshError,
  connectionFailed,
  disconnectFailed,
  formatMeshError,
  notConnected,
  publishFailed,
  subscribeFailed,
  toError,
  unknownDevice,
} from "./errors.js";
import { MessageInbox } from "./inbox.js";
import type {
  Credentials,
  DeviceKind,
  DeviceRecord,
  DeviceStatus,
  InboundMessage,
  OutboundMessage,
  RawMessage,
  SceneRecord,
} from "./schema.js";
import {
  buildCtlCommand,
  buildHslCommand,
  buildLightnessCommand,
  buildPowerCommand,
  buildRecallSceneCommand,
  classifyTopic,
  encodePayload,
  parseInboundMessage,
  subscriptionTopics,
  toDeviceRecord,
  toSceneRecord,
  withStatus,
} from "./transform.js";

const log = createLogger("mesh");

const DEFAULT_CONNECT_TIMEOUT_MS = 30000;
const DEFAULT_KEEPALIVE_SECONDS = 60;
const DEFAULT_RECONNECT_PERIOD_MS = 5000;
const DEFAULT_INBOX_CAPACITY = 1000;

/** Subscription grant code for a refused subscription. */
const SUBACK_FAILURE = 128;

/**
 * Registry change callback. Re-read whatever you derive from the registry.
 */
export type MeshObserver = () => void;

export type Unsubscribe = () => void;

export type MeshCoordinatorOptions = Readonly<{
  gatewayTopic: string;
  clientId?: string | undefined;
  connectTimeoutMs?: number;
  keepaliveSeconds?: number;
  /** Delay between attempts to recover a connection lost after CONNACK. */
  reconnectPeriodMs?: number;
  inboxCapacity?: number;
}>;

export class MeshCoordinator {
  readonly gatewayTopic: string;

  private client: MqttClient | null = null;
  private readonly devices: Record<DeviceKind, Map<string, DeviceRecord>> = {
    lights: new Map(),
    groups: new Map(),
  };
  private readonly sceneMap = new Map<string, SceneRecord>();
  private observers: MeshObserver[] = [];
  private readonly inbox: MessageInbox;

  constructor(private readonly options: MeshCoordinatorOptions) {
    this.gatewayTopic = options.gatewayTopic;
    this.inbox = new MessageInbox(
      options.inboxCapacity ?? DEFAULT_INBOX_CAPACITY,
      (message) => {
        this.handleMessage(message);
      },
    );
  }

  // ===========================================================================
  // Registry Access
  // ===========================================================================

  get lights(): ReadonlyMap<string, DeviceRecord> {
    return this.devices.lights;
  }

  get groups(): ReadonlyMap<string, DeviceRecord> {
    return this.devices.groups;
  }

  get scenes(): ReadonlyMap<string, SceneRecord> {
    return this.sceneMap;
  }

  getDevice(kind: DeviceKind, name: string): DeviceRecord | null {
    return this.devices[kind].get(name) ?? null;
  }

  /**
   * Register a registry-change observer.
   *
   * @returns a function that removes this registration
   */
  subscribe(observer: MeshObserver): Unsubscribe {
    this.observers.push(observer);
    return () => {
      const index = this.observers.indexOf(observer);
      if (index !== -1) {
        this.observers.splice(index, 1);
      }
    };
  }

  // ===========================================================================
  // Connection Lifecycle
  // ===========================================================================

  /**
   * Current MQTT client, if any.
   */
  get connection(): MqttClient | null {
    return this.client;
  }

  /**
   * True while a client exists and reports itself connected.
   */
  available(): boolean {
    return this.client?.connected ?? false;
  }

  /**
   * Connect to the broker and subscribe to the gateway topics.
   * Resolves once subscriptions are granted, or with the failure; a
   * failed attempt closes the client and is not retried. Once connected,
   * the client reconnects and resubscribes by itself after a drop.
   */
  async connect(
    host: string,
    port: number,
    credentials?: Credentials | null,
  ): Promise<Result<true, MeshError>> {
    if (this.client?.connected) {
      log.warn("MQTT client already connected");
      return ok(true);
    }

    if (this.client) {
      const closed = await this.disconnect();
      if (closed.isErr()) {
        return err(closed.error);
      }
    }

    const brokerUrl = `mqtt://${host}:${port}`;
    const startTime = Date.now();
    logOperationStart(log, "connect", {
      brokerUrl,
      authenticated: Boolean(credentials),
    });

    const client = mqtt.connect(brokerUrl, this.clientOptions(credentials));
    this.client = client;
    this.setupClientHandlers(client);

    const result = await this.awaitConnected(client);

    if (result.isErr()) {
      logOperationFailed(log, "connect", formatMeshError(result.error), {
        brokerUrl,
      });
      // Close failures are logged by disconnect
      await this.disconnect();
      return result;
    }

    client.options.reconnectPeriod =
      this.options.reconnectPeriodMs ?? DEFAULT_RECONNECT_PERIOD_MS;
    logOperationComplete(log, "connect", startTime, { brokerUrl });

    return result;
  }

  /**
   * Close the connection. Safe to call when not connected.
   */
  async disconnect(): Promise<Result<void, MeshError>> {
    const client = this.client;
    if (!client) {
      log.debug("Disconnect requested without an MQTT client");
      return ok(undefined);
    }

    this.client = null;
    const startTime = Date.now();
    logOperationStart(log, "disconnect");

    const result = await ResultAsync.fromPromise(client.endAsync(), (error) =>
      disconnectFailed("Failed to close MQTT client", toError(error)),
    );

    if (result.isErr()) {
      logOperationFailed(log, "disconnect", formatMeshError(result.error));
    } else {
      logOperationComplete(log, "disconnect", startTime);
    }

    return result;
  }

  private clientOptions(credentials?: Credentials | null): IClientOptions {
    const options: IClientOptions = {
      reconnectPeriod: 0, // Enabled once the first connect succeeded
      connectTimeout:
        this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
      keepalive: this.options.keepaliveSeconds ?? DEFAULT_KEEPALIVE_SECONDS,
    };
    if (this.options.clientId) {
      options.clientId = this.options.clientId;
    }
    if (credentials) {
      options.username = credentials.username;
      options.password = credentials.password;
      log.info(
        { username: credentials.username },
        "MQTT authentication configured",
      );
    }
    return options;
  }

  /**
   * Set up MQTT client event handlers.
   */
  private setupClientHandlers(client: MqttClient): void {
    client.on("message", (topic, payload) => {
      this.enqueue({ topic, payload: payload.toString() });
    });

    client.on("error", (error) => {
      log.error({ error: error.message }, "MQTT client error");
    });

    client.on("close", () => {
      log.warn("MQTT connection closed");
    });

    client.on("offline", () => {
      log.warn("MQTT client offline");
    });
  }

  private awaitConnected(client: MqttClient): Promise<Result<true, MeshError>> {
    return new Promise((resolve) => {
      let settled = false;
      const settle = (result: Result<true, MeshError>): void => {
        if (settled) return;
        settled = true;
        resolve(result);
      };

      client.on("connect", () => {
        if (settled) {
          log.info("Reconnected to MQTT broker");
          return;
        }
        log.info("Connected to MQTT broker");
        this.subscribeToTopics(client).then(settle, (error: unknown) =>
          settle(err(subscribeFailed("Subscribe failed", toError(error)))),
        );
      });

      client.on("error", (error) => {
        settle(err(connectionFailed(error.message, error)));
      });

      client.on("close", () => {
        settle(err(connectionFailed("Connection closed before CONNACK")));
      });
    });
  }

  /**
   * Subscribe to discovery and status topics under the gateway root.
   */
  private subscribeToTopics(client: MqttClient): ResultAsync<true, MeshError> {
    const topics = subscriptionTopics(this.gatewayTopic);

    return ResultAsync.fromPromise(client.subscribeAsync(topics), (error) =>
      subscribeFailed(
        `Failed to subscribe to ${topics.join(", ")}`,
        toError(error),
      ),
    ).andThen((granted): Result<true, MeshError> => {
      const refused = granted
        .filter((grant) => grant.qos === SUBACK_FAILURE)
        .map((grant) => grant.topic);

      if (refused.length > 0) {
        return err(subscribeFailed(`Broker refused ${refused.join(", ")}`));
      }

      log.debug({ topics }, "Subscribed to gateway topics");
      return ok(true);
    });
  }

  // ===========================================================================
  // Inbound Messages
  // ===========================================================================

  /**
   * Queue a message for routing on a later event-loop turn.
   *
   * @returns false when the inbox is full
   */
  enqueue(message: RawMessage): boolean {
    return this.inbox.push(message);
  }

  /**
   * Resolves once every queued inbound message has been handled.
   */
  whenIdle(): Promise<void> {
    return this.inbox.whenIdle();
  }

  /**
   * Route one inbound message: parse, mutate the registry, notify observers.
   * Messages that fail to parse are logged and dropped without notifying.
   */
  handleMessage(message: RawMessage): Result<InboundMessage, MeshError> {
    const parsed = parseInboundMessage(this.gatewayTopic, message);

    if (
      parsed.isErr() &&
      parsed.error.type === "INVALID_PAYLOAD" &&
      this.isStatusForUnknownDevice(message.topic)
    ) {
      log.debug(
        { topic: message.topic, error: formatMeshError(parsed.error) },
        "Status for unknown device",
      );
      this.notifyObservers();
      return ok({ type: "ignored" });
    }

    if (parsed.isErr()) {
      log.error(
        { topic: message.topic, payload: message.payload },
        formatMeshError(parsed.error),
      );
      return parsed;
    }

    log.debug(
      { topic: message.topic, type: parsed.value.type },
      "Received MQTT message",
    );

    this.apply(parsed.value);
    this.notifyObservers();

    return parsed;
  }

  private isStatusForUnknownDevice(topic: string): boolean {
    const route = classifyTopic(this.gatewayTopic, topic);
    return (
      route.type === "status" && !this.devices[route.kind].has(route.name)
    );
  }

  private apply(message: InboundMessage): void {
    switch (message.type) {
      case "deviceDiscovery": {
        if (!message.devices || message.devices.length === 0) return;
        const collection = this.devices[message.kind];
        for (const descriptor of message.devices) {
          collection.set(
            descriptor.name,
            toDeviceRecord(message.kind, descriptor),
          );
          log.info(
            { kind: message.kind, name: descriptor.name },
            "Discovered device",
          );
        }
        return;
      }

      case "sceneDiscovery": {
        if (!message.scenes || message.scenes.length === 0) return;
        for (const descriptor of message.scenes) {
          this.sceneMap.set(descriptor.name, toSceneRecord(descriptor));
          log.info({ name: descriptor.name }, "Discovered scene");
        }
        return;
      }

      case "status": {
        if (message.status === null) {
          log.debug(
            { kind: message.kind, name: message.name },
            "Empty status payload",
          );
          return;
        }
        const collection = this.devices[message.kind];
        const record = collection.get(message.name);
        if (!record) {
          log.debug(
            { kind: message.kind, name: message.name },
            "Status for unknown device",
          );
          return;
        }
        collection.set(message.name, withStatus(record, message.status));
        log.debug(
          { kind: message.kind, name: message.name, status: message.status },
          "Status updated",
        );
        return;
      }

      case "ignored":
        return;
    }
  }

  /**
   * Merge locally-known status ahead of the gateway confirming it.
   */
  applyOptimisticStatus(
    kind: DeviceKind,
    name: string,
    fields: Readonly<Partial<DeviceStatus>>,
  ): Result<DeviceRecord, MeshError> {
    const collection = this.devices[kind];
    const record = collection.get(name);
    if (!record) {
      return err(unknownDevice(name));
    }

    const updated = withStatus(record, fields);
    collection.set(name, updated);
    this.notifyObservers();

    return ok(updated);
  }

  private notifyObservers(): void {
    for (const observer of [...this.observers]) {
      try {
        observer();
      } catch (error) {
        log.error(
          { error: error instanceof Error ? error.message : String(error) },
          "Registry observer failed",
        );
      }
    }
  }

  // ===========================================================================
  // Outbound Commands
  // ===========================================================================

  /**
   * Publish a command. Rejected, not queued, while disconnected.
   */
  async publish(message: OutboundMessage): Promise<Result<void, MeshError>> {
    const client = this.client;
    if (!client || !client.connected) {
      const error = notConnected(message.topic);
      log.error({ topic: message.topic }, formatMeshError(error));
      return err(error);
    }

    const payload = encodePayload(message.payload);
    const result = await ResultAsync.fromPromise(
      client.publishAsync(message.topic, payload),
      (error) => {
        const cause = toError(error);
        return publishFailed(message.topic, cause.message, cause);
      },
    );

    if (result.isErr()) {
      log.error({ topic: message.topic }, formatMeshError(result.error));
      return err(result.error);
    }

    log.debug({ topic: message.topic, payload }, "Published command");
    return ok(undefined);
  }

  setPower(
    kind: DeviceKind,
    name: string,
    on: boolean,
  ): Promise<Result<void, MeshError>> {
    return this.publish(buildPowerCommand(this.gatewayTopic, kind, name, on));
  }

  /**
   * @param lightness - 0.0 to 1.0
   */
  setLightness(
    kind: DeviceKind,
    name: string,
    lightness: number,
  ): Promise<Result<void, MeshError>> {
    return this.publish(
      buildLightnessCommand(this.gatewayTopic, kind, name, lightness),
    );
  }

  /**
   * @param hue - degrees, 0 to 360
   * @param saturation - 0.0 to 1.0
   * @param lightness - 0.0 to 1.0
   */
  setHsl(
    kind: DeviceKind,
    name: string,
    hue: number,
    saturation: number,
    lightness: number,
  ): Promise<Result<void, MeshError>> {
    return this.publish(
      buildHslCommand(this.gatewayTopic, kind, name, hue, saturation, lightness),
    );
  }

  /**
   * @param temperature - Kelvin
   * @param lightness - 0.0 to 1.0
   */
  setCtl(
    kind: DeviceKind,
    name: string,
    temperature: number,
    lightness: number,
  ): Promise<Result<void, MeshError>> {
    return this.publish(
      buildCtlCommand(this.gatewayTopic, kind, name, temperature, lightness),
    );
  }

  /**
   * Recall a scene on one light or group, or on the whole mesh when no
   * target is given.
   */
  recallScene(
    sceneName: string,
    targetKind?: DeviceKind,
    targetName?: string,
  ): Promise<Result<void, MeshError>> {
    return this.publish(
      buildRecallSceneCommand(
        this.gatewayTopic,
        sceneName,
        targetKind,
        targetName,
      ),
    );
  }
}
