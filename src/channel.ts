/**
 * Self-healing channel on a shared broker connection.
 *
 * A background task watches the current channel and re-opens a fresh one
 * whenever it closes, until the supervisor itself is closed. Every public
 * operation runs against whichever channel is current at call time.
 */

import {
  BrokerChannel,
  BrokerConnection,
  ChannelSupervisorOptions,
  Delivery,
  QueueInfo,
  RawMessage,
} from './types';
import { CancelError, ChannelOpenError, CloseError, ConnectionError, DeliveryAckError } from './errors';
import { closeChannel } from './connection';
import { createLogger, describeError, Logger } from './logger';
import { aborted, sleep } from './sleep';
import { DeliveryStream } from './stream';

const DEFAULT_REDIAL_DELAY = 10_000;

interface ChannelHandle {
  channel: BrokerChannel;
  open: boolean;
  /** Resolves with the close cause, if the broker reported one. */
  closed: Promise<Error | null>;
}

interface ActiveConsumer {
  stream: DeliveryStream;
  channel: BrokerChannel;
}

/**
 * Owns one broker channel and keeps it alive.
 */
export class ChannelSupervisor {
  private connection: BrokerConnection;
  private logger: Logger;
  private redialDelay: number;
  private handle: ChannelHandle | null = null;
  private consumers: Map<string, ActiveConsumer> = new Map();
  private stopController = new AbortController();
  private redialing: Promise<void> = Promise.resolve();
  private closing: Promise<void> | null = null;

  private constructor(connection: BrokerConnection, options: ChannelSupervisorOptions) {
    this.connection = connection;
    this.logger = options.logger ?? createLogger('redial');
    this.redialDelay = options.redialDelay ?? DEFAULT_REDIAL_DELAY;
  }

  /**
   * Opens a channel on the shared connection and starts watching it.
   *
   * @param connection - Shared broker connection
   * @param options - Supervisor options
   * @returns Promise resolving to the running supervisor
   * @throws ConnectionError if the connection cannot be established
   * @throws ChannelOpenError if the channel cannot be opened
   */
  static async create(
    connection: BrokerConnection,
    options: ChannelSupervisorOptions = {}
  ): Promise<ChannelSupervisor> {
    const supervisor = new ChannelSupervisor(connection, options);

    connection.acquire();
    try {
      await supervisor.initChannel();
    } catch (error) {
      await connection.release();
      throw error;
    }

    supervisor.redialing = supervisor.redial();
    return supervisor;
  }

  /**
   * Declares a durable, non-auto-delete, non-internal exchange.
   */
  async declareExchange(name: string, kind: string): Promise<void> {
    await this.channel.assertExchange(name, kind, {
      durable: true,
      autoDelete: false,
      internal: false,
    });
  }

  /**
   * Declares a durable, non-exclusive, non-auto-delete queue.
   *
   * @returns Queue name with its message and consumer counts
   */
  async declareQueue(name: string): Promise<QueueInfo> {
    const { queue, messageCount, consumerCount } = await this.channel.assertQueue(name, {
      durable: true,
      autoDelete: false,
      exclusive: false,
    });

    return { queue, messageCount, consumerCount };
  }

  async bindQueue(name: string, routingKey: string, exchange: string): Promise<void> {
    await this.channel.bindQueue(name, exchange, routingKey);
  }

  /**
   * Publishes a plain-text message.
   *
   * @returns true if sent (buffer not full), false otherwise
   */
  publish(exchange: string, routingKey: string, body: Buffer | string): boolean {
    const content = typeof body === 'string' ? Buffer.from(body, 'utf-8') : body;

    return this.channel.publish(exchange, routingKey, content, {
      mandatory: false,
      contentType: 'text/plain',
    });
  }

  /**
   * Starts a consumer on the current channel.
   * The returned stream ends when the consumer is cancelled or the channel
   * it was opened on closes. Every delivery must be acked or rejected.
   *
   * @param queue - Queue name
   * @param consumerId - Consumer tag
   * @returns Promise resolving to the delivery stream
   */
  async consume(queue: string, consumerId: string): Promise<DeliveryStream> {
    const channel = this.channel;
    const stream = new DeliveryStream(consumerId);

    this.consumers.get(consumerId)?.stream.end();
    this.consumers.set(consumerId, { stream, channel });

    try {
      await channel.consume(
        queue,
        (msg) => {
          if (! msg) {
            this.logger.warn('Consumer cancelled by broker', { consumer: consumerId });
            this.endConsumer(consumerId, stream);
            return;
          }
          stream.push(this.toDelivery(channel, consumerId, msg));
        },
        { consumerTag: consumerId, noAck: false, exclusive: false, noLocal: false }
      );
    } catch (error) {
      this.endConsumer(consumerId, stream);
      throw error;
    }

    const handle = this.handle;
    if (! handle || handle.channel !== channel || ! handle.open) {
      this.endConsumer(consumerId, stream);
    }

    return stream;
  }

  /**
   * Stops deliveries to a consumer and ends its stream.
   * Waits for the broker to confirm the cancellation; amqplib has no
   * no-wait cancel.
   *
   * @param consumerId - Consumer tag
   * @throws CancelError if the broker rejects the cancellation
   */
  async cancel(consumerId: string): Promise<void> {
    const active = this.consumers.get(consumerId);
    const channel = active?.channel ?? this.channel;

    try {
      await channel.cancel(consumerId);
    } catch (error) {
      throw new CancelError(`cancel consumer ${consumerId} error: ${describeError(error)}`, { cause: error });
    } finally {
      if (active) {
        this.endConsumer(consumerId, active.stream);
      }
    }
  }

  /**
   * Stops re-dialing and closes the current channel.
   * Repeated calls share the first call's outcome.
   *
   * @throws CloseError if the channel fails to close
   */
  close(): Promise<void> {
    if (! this.closing) {
      this.closing = this.shutdown();
    }

    return this.closing;
  }

  /**
   * Whether the current channel is open.
   */
  isOpen(): boolean {
    return this.handle?.open ?? false;
  }

  /**
   * Whether close() has been called.
   */
  isClosed(): boolean {
    return this.stopController.signal.aborted;
  }

  private get channel(): BrokerChannel {
    if (! this.handle) {
      throw new Error('Channel not open');
    }

    return this.handle.channel;
  }

  /**
   * Makes sure the connection is live, drops a stale channel and opens a
   * new one. Gives up as soon as the supervisor is closed.
   */
  private async initChannel(): Promise<void> {
    const signal = this.stopController.signal;

    if (! this.connection.isLive()) {
      try {
        await this.connection.connect(signal);
      } catch (error) {
        throw new ConnectionError(`broker connection error: ${describeError(error)}`, { cause: error });
      }
    }

    if (this.handle?.open) {
      await closeChannel(this.handle.channel, this.logger);
    }

    let channel: BrokerChannel;
    try {
      channel = await this.connection.openChannel(signal);
    } catch (error) {
      throw new ChannelOpenError(`open channel error: ${describeError(error)}`, { cause: error });
    }

    this.handle = this.watch(channel);
  }

  private watch(channel: BrokerChannel): ChannelHandle {
    let cause: Error | null = null;
    let resolveClosed: (cause: Error | null) => void = () => undefined;

    const handle: ChannelHandle = {
      channel,
      open: true,
      closed: new Promise((resolve) => {
        resolveClosed = resolve;
      }),
    };

    channel.on('error', (err: Error) => {
      cause = err;
    });
    channel.once('close', () => {
      handle.open = false;
      for (const [consumerId, active] of this.consumers) {
        if (active.channel === channel) {
          this.endConsumer(consumerId, active.stream);
        }
      }
      resolveClosed(cause);
    });

    return handle;
  }

  /**
   * Waits for the current channel to close, then re-opens it until it
   * succeeds or the supervisor is closed.
   */
  private async redial(): Promise<void> {
    const signal = this.stopController.signal;
    const stopped: Promise<null> = aborted(signal).then(() => null);

    while (! signal.aborted) {
      const current = this.handle;
      if (! current) {
        return;
      }

      const cause = await Promise.race([current.closed, stopped]);
      if (signal.aborted) {
        return;
      }

      this.logger.warn('Channel closing', { cause: cause ? cause.message : 'closed' });

      while (! signal.aborted) {
        this.logger.info('Reconnecting...');
        try {
          await this.initChannel();
          this.logger.info('Channel re-established');
          break;
        } catch (error) {
          if (signal.aborted) {
            break;
          }
          this.logger.error('Reconnect error', error instanceof Error ? error : { reason: String(error) });
          await sleep(this.redialDelay, signal);
        }
      }
    }
  }

  private async shutdown(): Promise<void> {
    this.stopController.abort();
    await this.redialing;

    try {
      const handle = this.handle;
      if (handle?.open) {
        try {
          await handle.channel.close();
        } catch (error) {
          throw new CloseError(`close channel error: ${describeError(error)}`, { cause: error });
        }
      }
    } finally {
      await this.connection.release();
    }
  }

  private endConsumer(consumerId: string, stream: DeliveryStream): void {
    stream.end();
    if (this.consumers.get(consumerId)?.stream === stream) {
      this.consumers.delete(consumerId);
    }
  }

  private toDelivery(channel: BrokerChannel, consumerTag: string, msg: RawMessage): Delivery {
    let settled = false;

    const settle = (action: string, fn: () => void) => {
      if (settled) {
        throw new DeliveryAckError(`delivery ${msg.fields.deliveryTag} already settled`);
      }
      settled = true;
      try {
        fn();
      } catch (error) {
        throw new DeliveryAckError(`${action} delivery ${msg.fields.deliveryTag} error: ${describeError(error)}`, {
          cause: error,
        });
      }
    };

    return {
      body: msg.content,
      consumerTag,
      deliveryTag: msg.fields.deliveryTag,
      redelivered: msg.fields.redelivered,
      exchange: msg.fields.exchange,
      routingKey: msg.fields.routingKey,
      contentType: msg.properties.contentType,
      headers: msg.properties.headers,
      ack: () => settle('ack', () => channel.ack(msg, false)),
      reject: (requeue = true) => settle('reject', () => channel.reject(msg, requeue)),
    };
  }
}
