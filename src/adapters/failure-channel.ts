import { AsyncMessageQueue } from "../core/async-message-queue.js";
import type { FailureSink } from "../interfaces/failure-sink.js";
import type { DeliveryFailure } from "../types/delivery.js";

/**
 * Async-iterable stream of delivery failures. Hand `sink` to one or more clients and
 * consume with `for await`. Unbounded: producers never wait on the consumer.
 */
export class FailureChannel implements AsyncIterable<DeliveryFailure> {
  private readonly queue = new AsyncMessageQueue<DeliveryFailure>();

  readonly sink: FailureSink = (failure) => {
    this.queue.enqueue(failure);
  };

  /** End iteration once already-queued failures are consumed. */
  close(): void {
    this.queue.finish();
  }

  get closed(): boolean {
    return this.queue.isFinished;
  }

  [Symbol.asyncIterator](): AsyncIterator<DeliveryFailure> {
    return this.queue[Symbol.asyncIterator]();
  }
}
