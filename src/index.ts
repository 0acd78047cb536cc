/**
 * Resilient RabbitMQ client layer.
 *
 * Keeps a channel alive across channel and connection failures, and runs
 * independent, crash-isolated consumers with a drain-complete shutdown.
 *
 * @example
 * ```typescript
 * import { ConsumerSupervisor, SharedConnection, loadConfig } from 'amqp-supervisor';
 *
 * const connection = SharedConnection.fromConfig(loadConfig());
 * const consumers = await ConsumerSupervisor.create(connection);
 *
 * consumers.register('orders', 'billing', async (body) => {
 *   await charge(JSON.parse(body.toString()));
 * });
 * consumers.start();
 *
 * process.on('SIGTERM', () => {
 *   consumers.stop().then(() => process.exit(0));
 * });
 * ```
 */

// Core exports
export { ChannelSupervisor } from './channel';
export { ConsumerSupervisor, runWithRecovery } from './consumer';
export { DeliveryStream } from './stream';

// Connection utilities
export {
  SharedConnection,
  connectWithRetries,
  createChannel,
  closeConnection,
  closeChannel,
} from './connection';

// Configuration and logging
export { loadConfig, buildUrl } from './config';
export { createLogger } from './logger';
export { sleep } from './sleep';

// Errors
export {
  BrokerError,
  ConnectionError,
  ChannelOpenError,
  ConsumeAttachError,
  HandlerError,
  DeliveryAckError,
  CancelError,
  CloseError,
  LifecycleError,
} from './errors';

// Types
export type { HandlerResult } from './consumer';
export type { BrokerErrorCode } from './errors';
export type { Logger } from './logger';
export type {
  BrokerConfig,
  BrokerConnection,
  BrokerChannel,
  ChannelSupervisorOptions,
  ConnectionOptions,
  ConsumerBinding,
  ConsumerState,
  ConsumerSupervisorOptions,
  ConsumeOptions,
  Delivery,
  DeliveryInfo,
  ExchangeDeclareOptions,
  MessageHandler,
  PublishOptions,
  QueueDeclareOptions,
  QueueInfo,
  RawMessage,
  RawConnection,
  RawChannel,
} from './types';
