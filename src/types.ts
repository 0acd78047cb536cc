/**
 * Type definitions for the supervised AMQP client.
 * The core only depends on the structural interfaces below; amqplib's
 * Channel satisfies BrokerChannel as-is.
 */

import type amqp from 'amqplib';
import type { Logger } from './logger';

/**
 * Options for connecting to RabbitMQ with retry logic.
 */
export interface ConnectionOptions {
  /** Number of connection retries. Default: 5. Use -1 for unlimited retries. */
  retries?: number;
  /** Delay between retry attempts in milliseconds. Default: 500ms. */
  retryDelay?: number;
  logger?: Logger;
}

/**
 * Broker connection settings, loaded once per process.
 */
export interface BrokerConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  vhost: string;
  tls: boolean;
}

/**
 * Queue metadata returned by a queue declaration.
 */
export interface QueueInfo {
  queue: string;
  messageCount: number;
  consumerCount: number;
}

/**
 * Message as handed over by the transport.
 */
export interface RawMessage {
  content: Buffer;
  fields: {
    deliveryTag: number;
    redelivered: boolean;
    exchange: string;
    routingKey: string;
  };
  properties: {
    contentType?: string;
    headers?: Record<string, unknown>;
  };
}

export interface ExchangeDeclareOptions {
  durable: boolean;
  autoDelete: boolean;
  internal: boolean;
}

export interface QueueDeclareOptions {
  durable: boolean;
  autoDelete: boolean;
  exclusive: boolean;
}

export interface PublishOptions {
  mandatory: boolean;
  contentType: string;
}

export interface ConsumeOptions {
  consumerTag: string;
  noAck: boolean;
  exclusive: boolean;
  noLocal: boolean;
}

/**
 * The channel-scoped protocol operations the supervisors rely on.
 */
export interface BrokerChannel {
  assertExchange(exchange: string, type: string, options: ExchangeDeclareOptions): Promise<unknown>;
  assertQueue(queue: string, options: QueueDeclareOptions): Promise<QueueInfo>;
  bindQueue(queue: string, source: string, pattern: string): Promise<unknown>;
  publish(exchange: string, routingKey: string, content: Buffer, options: PublishOptions): boolean;
  consume(
    queue: string,
    onMessage: (msg: RawMessage | null) => void,
    options: ConsumeOptions
  ): Promise<{ consumerTag: string }>;
  cancel(consumerTag: string): Promise<unknown>;
  ack(message: RawMessage, allUpTo?: boolean): void;
  reject(message: RawMessage, requeue?: boolean): void;
  close(): Promise<void>;
  on(event: 'error', listener: (err: Error) => void): unknown;
  once(event: 'close', listener: () => void): unknown;
}

/**
 * A possibly shared, possibly stale handle to the broker connection.
 */
export interface BrokerConnection {
  /** Whether the connection is currently usable. */
  isLive(): boolean;
  /**
   * (Re-)establishes the connection if it is not live.
   * Rejects as soon as `signal` is aborted.
   */
  connect(signal?: AbortSignal): Promise<void>;
  openChannel(signal?: AbortSignal): Promise<BrokerChannel>;
  /** Registers one more user of the connection. */
  acquire(): void;
  /** Drops a user; the last one out closes the connection. */
  release(): Promise<void>;
}

/**
 * One inbound message, without its disposition methods.
 */
export interface DeliveryInfo {
  body: Buffer;
  consumerTag: string;
  deliveryTag: number;
  redelivered: boolean;
  exchange: string;
  routingKey: string;
  contentType?: string;
  headers?: Record<string, unknown>;
}

/**
 * One inbound message. Exactly one of ack or reject must be called.
 */
export interface Delivery extends DeliveryInfo {
  ack(): void;
  reject(requeue?: boolean): void;
}

/**
 * Business logic run for each delivery. Throwing or rejecting marks the
 * delivery as failed.
 */
export type MessageHandler = (body: Buffer, delivery: DeliveryInfo) => void | Promise<void>;

export interface ChannelSupervisorOptions {
  /** Delay between channel re-open attempts in milliseconds. Default: 10s. */
  redialDelay?: number;
  logger?: Logger;
}

export interface ConsumerSupervisorOptions extends ChannelSupervisorOptions {
  /** Delay before a consumer re-attaches to its queue in milliseconds. Default: 15s. */
  retryDelay?: number;
}

/**
 * Consumer supervisor lifecycle.
 */
export type ConsumerState = 'idle' | 'running' | 'stopping' | 'stopped';

/**
 * A registered (queue, handler) binding.
 */
export interface ConsumerBinding {
  readonly queue: string;
  readonly handler: MessageHandler;
}

/**
 * Raw connection from amqplib (for reference).
 */
export type RawConnection = Awaited<ReturnType<typeof amqp.connect>>;

/**
 * Raw channel from amqplib (for reference).
 */
export type RawChannel = amqp.Channel;
