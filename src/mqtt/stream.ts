/**
 * MQTT Module - Message Streams
 *
 * One queue per topic filter. The router pushes; a single listener task
 * consumes with `for await`.
 */
import type { MqttMessage } from "./schema.js";

function abortReason(signal: AbortSignal): unknown {
  const reason: unknown = signal.reason;
  return reason ?? Object.assign(new Error("Aborted"), { name: "AbortError" });
}

/**
 * Async queue of messages: `push` never blocks, `next` waits for one.
 */
export class MessageStream {
  private buffer: MqttMessage[] = [];
  private waiting: Array<(message: MqttMessage) => void> = [];

  constructor(readonly label: string) {}

  /** Enqueue a message, or hand it straight to a waiting consumer. */
  push(message: MqttMessage): void {
    const waiter = this.waiting.shift();
    if (waiter) {
      waiter(message);
    } else {
      this.buffer.push(message);
    }
  }

  /** Number of buffered messages not yet consumed. */
  get pending(): number {
    return this.buffer.length;
  }

  /**
   * Next message, or a rejection with the abort reason once `signal`
   * fires.
   */
  next(signal: AbortSignal): Promise<MqttMessage> {
    if (signal.aborted) {
      return Promise.reject(abortReason(signal));
    }

    const buffered = this.buffer.shift();
    if (buffered !== undefined) return Promise.resolve(buffered);

    return new Promise<MqttMessage>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiting.indexOf(deliver);
        if (index >= 0) this.waiting.splice(index, 1);
        reject(abortReason(signal));
      };
      const deliver = (message: MqttMessage) => {
        signal.removeEventListener("abort", onAbort);
        resolve(message);
      };

      this.waiting.push(deliver);
      signal.addEventListener("abort", onAbort, { once: true });
    });
  }

  /**
   * Iterate until `signal` fires; the iteration then throws the abort
   * reason.
   */
  async *messages(signal: AbortSignal): AsyncGenerator<MqttMessage, void> {
    while (true) {
      yield await this.next(signal);
    }
  }
}
