/**
 * Mesh Module - Inbound Message Channel
 *
 * Bounded FIFO between the MQTT client's message events and the
 * coordinator. Messages are handed to a single consumer on a later
 * event-loop turn, in arrival order.
 */
import { createLogger } from "../logger.js";
import type { RawMessage } from "./schema.js";

const log = createLogger("mesh");

export type InboxConsumer = (message: RawMessage) => void;

export class MessageInbox {
  private readonly queue: RawMessage[] = [];
  private scheduled: NodeJS.Immediate | null = null;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly capacity: number,
    private readonly consumer: InboxConsumer,
  ) {}

  get size(): number {
    return this.queue.length;
  }

  /**
   * Queue a message for the consumer.
   *
   * @returns false when the inbox is full and the message was dropped
   */
  push(message: RawMessage): boolean {
    if (this.queue.length >= this.capacity) {
      log.warn(
        { topic: message.topic, capacity: this.capacity },
        "Inbox full, dropping message",
      );
      return false;
    }

    this.queue.push(message);
    this.schedule();
    return true;
  }

  /**
   * Resolves once every queued message has been consumed.
   */
  whenIdle(): Promise<void> {
    if (this.queue.length === 0 && this.scheduled === null) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = setImmediate(() => this.drain());
  }

  private drain(): void {
    this.scheduled = null;

    let message = this.queue.shift();
    while (message) {
      try {
        this.consumer(message);
      } catch (error) {
        log.error(
          {
            topic: message.topic,
            error: error instanceof Error ? error.message : String(error),
          },
          "Inbound message handler failed",
        );
      }
      message = this.queue.shift();
    }

    this.notifyIdle();
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
