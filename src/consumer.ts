/**
 * Runs independent, crash-isolated consumers over one supervised channel.
 *
 * Each registered (queue, handler) binding gets its own consumption loop.
 * A loop re-attaches to its queue whenever its delivery stream ends, so a
 * re-dialed channel is picked up without caller involvement.
 */

import {
  BrokerConnection,
  ConsumerBinding,
  ConsumerState,
  ConsumerSupervisorOptions,
  Delivery,
  DeliveryInfo,
  MessageHandler,
} from './types';
import { ChannelSupervisor } from './channel';
import { ConnectionError, ConsumeAttachError, HandlerError, LifecycleError } from './errors';
import { createLogger, describeError, Logger } from './logger';
import { sleep } from './sleep';

const DEFAULT_RETRY_DELAY = 15_000;

/** Upper bound on the stack text kept for a crashed handler. */
const MAX_TRACE_LENGTH = 64 << 10;

let consumerSeq = 0;

/**
 * Outcome of one isolated handler invocation.
 */
export type HandlerResult = { ok: true } | { ok: false; error: HandlerError };

/**
 * Invokes a handler, turning any throw or rejection into a failed result.
 * Never throws.
 *
 * @param handler - Business logic
 * @param delivery - Delivery passed to the handler
 * @param logger - Receives the fault and its stack
 */
export const runWithRecovery = async (
  handler: MessageHandler,
  delivery: DeliveryInfo,
  logger: Logger
): Promise<HandlerResult> => {
  try {
    await handler(delivery.body, delivery);
    return { ok: true };
  } catch (error) {
    const stack = error instanceof Error && error.stack ? error.stack : String(error);
    const trace = stack.slice(0, MAX_TRACE_LENGTH);

    logger.error('Handler failed', {
      consumer: delivery.consumerTag,
      deliveryTag: delivery.deliveryTag,
      error: describeError(error),
      trace,
    });

    return {
      ok: false,
      error: new HandlerError(`handler ${delivery.consumerTag} failed: ${describeError(error)}`, delivery.consumerTag, trace, {
        cause: error,
      }),
    };
  }
};

/**
 * Consumes several queues concurrently through one ChannelSupervisor.
 */
export class ConsumerSupervisor {
  private channel: ChannelSupervisor;
  private logger: Logger;
  private retryDelay: number;
  private entries: Map<string, ConsumerBinding> = new Map();
  private state: ConsumerState = 'idle';
  private loops: Set<Promise<void>> = new Set();
  private stopController = new AbortController();
  private stopping: Promise<void> | null = null;

  constructor(channel: ChannelSupervisor, options: ConsumerSupervisorOptions = {}) {
    this.channel = channel;
    this.logger = options.logger ?? createLogger('consumer');
    this.retryDelay = options.retryDelay ?? DEFAULT_RETRY_DELAY;
  }

  /**
   * Creates a consumer supervisor with its own supervised channel.
   *
   * @param connection - Shared broker connection
   * @param options - Consumer and channel options
   * @throws ConnectionError if the channel cannot be set up. Its `cause` is
   * the original ConnectionError or ChannelOpenError; check the cause to tell
   * the two apart.
   */
  static async create(
    connection: BrokerConnection,
    options: ConsumerSupervisorOptions = {}
  ): Promise<ConsumerSupervisor> {
    let channel: ChannelSupervisor;
    try {
      channel = await ChannelSupervisor.create(connection, {
        redialDelay: options.redialDelay,
        logger: options.logger,
      });
    } catch (error) {
      throw new ConnectionError(`amqp connect error: ${describeError(error)}`, { cause: error });
    }

    return new ConsumerSupervisor(channel, options);
  }

  /**
   * Registers a handler for a queue. Only allowed before start().
   *
   * @param queue - Queue to consume
   * @param label - Human-readable consumer name
   * @param handler - Business logic run for each delivery
   * @returns Unique consumer identity, `${label}-${seq}`
   * @throws LifecycleError once the supervisor has started
   */
  register(queue: string, label: string, handler: MessageHandler): string {
    if (this.state !== 'idle') {
      throw new LifecycleError(`Cannot register consumer '${label}' while ${this.state}`);
    }

    consumerSeq++;
    const consumerId = `${label}-${consumerSeq}`;
    this.entries.set(consumerId, { queue, handler });

    return consumerId;
  }

  /**
   * Launches one consumption loop per registered binding.
   * No-op unless idle.
   */
  start(): void {
    if (this.state !== 'idle') {
      return;
    }

    this.state = 'running';
    this.logger.info('Starting consumers', { count: this.entries.size });

    for (const [consumerId, entry] of this.entries) {
      const loop = this.run(consumerId, entry).finally(() => {
        this.loops.delete(loop);
      });
      this.loops.add(loop);
    }
  }

  /**
   * Cancels every consumer, waits for all loops to exit and closes the
   * channel. The supervisor cannot be reused afterwards.
   * Repeated calls return the same promise.
   *
   * @returns Promise resolving once shutdown is complete
   * @throws CloseError if the channel fails to close
   */
  stop(): Promise<void> {
    if (! this.stopping) {
      this.state = 'stopping';
      this.stopController.abort();
      this.stopping = this.shutdown();
    }

    return this.stopping;
  }

  getState(): ConsumerState {
    return this.state;
  }

  /**
   * Gets the registered consumer identities with their queues.
   */
  getConsumers(): Map<string, string> {
    return new Map(Array.from(this.entries, ([consumerId, entry]) => [consumerId, entry.queue]));
  }

  /**
   * Gets the supervised channel.
   */
  getChannel(): ChannelSupervisor {
    return this.channel;
  }

  private isRunning(): boolean {
    return this.state === 'running';
  }

  private async run(consumerId: string, entry: ConsumerBinding): Promise<void> {
    const signal = this.stopController.signal;

    while (this.isRunning()) {
      try {
        await this.consume(consumerId, entry);
      } catch (error) {
        this.logger.error('Run error', error instanceof Error ? error : { reason: String(error) });
        await sleep(this.retryDelay, signal);
        continue;
      }

      if (! this.isRunning()) {
        break;
      }

      this.logger.debug('Delivery stream ended, re-attaching', { consumer: consumerId, queue: entry.queue });
      await sleep(this.retryDelay, signal);
    }

    this.logger.debug('Consumer loop exited', { consumer: consumerId });
  }

  private async consume(consumerId: string, entry: ConsumerBinding): Promise<void> {
    let deliveries: AsyncIterable<Delivery>;
    try {
      deliveries = await this.channel.consume(entry.queue, consumerId);
    } catch (error) {
      throw new ConsumeAttachError(`amqp consume ${entry.queue} error: ${describeError(error)}`, { cause: error });
    }

    // stop() may have cancelled before this consumer existed on the broker
    if (! this.isRunning()) {
      await this.channel.cancel(consumerId).catch((error: unknown) => {
        this.logger.warn('Cancel after stop failed', { consumer: consumerId, reason: describeError(error) });
      });
    }

    for await (const delivery of deliveries) {
      const result = await runWithRecovery(entry.handler, delivery, this.logger);
      try {
        if (result.ok) {
          delivery.ack();
        } else {
          delivery.reject(true);
        }
      } catch (error) {
        this.logger.error('Delivery settle error', error instanceof Error ? error : { reason: String(error) });
      }
    }
  }

  private async shutdown(): Promise<void> {
    this.logger.info('Stopping consumers', { count: this.entries.size });

    try {
      await Promise.all(
        Array.from(this.entries.keys(), (consumerId) =>
          this.channel.cancel(consumerId).catch((error: unknown) => {
            this.logger.warn('Cancel failed', { consumer: consumerId, reason: describeError(error) });
          })
        )
      );

      await Promise.all(this.loops);
      await this.channel.close();
      this.logger.info('Consumers stopped');
    } finally {
      this.state = 'stopped';
    }
  }
}
