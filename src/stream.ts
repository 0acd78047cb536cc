/**
 * Push-fed async iterator of deliveries for one consumer.
 */

import { Delivery } from './types';

export class DeliveryStream implements AsyncIterableIterator<Delivery> {
  private buffer: Delivery[] = [];
  private waiting: ((result: IteratorResult<Delivery>) => void) | null = null;
  private ended = false;

  constructor(readonly consumerTag: string) {}

  /**
   * Queues a delivery for the reader.
   *
   * @returns false if the stream has already ended
   */
  push(delivery: Delivery): boolean {
    if (this.ended) {
      return false;
    }

    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: delivery, done: false });
      return true;
    }

    this.buffer.push(delivery);
    return true;
  }

  /**
   * Ends the stream. Buffered deliveries are still handed out first.
   */
  end(): void {
    if (this.ended) {
      return;
    }

    this.ended = true;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: undefined, done: true });
    }
  }

  isEnded(): boolean {
    return this.ended;
  }

  next(): Promise<IteratorResult<Delivery>> {
    const delivery = this.buffer.shift();
    if (delivery) {
      return Promise.resolve({ value: delivery, done: false });
    }

    if (this.ended) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  return(): Promise<IteratorResult<Delivery>> {
    this.end();
    this.buffer = [];
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<Delivery> {
    return this;
  }
}
