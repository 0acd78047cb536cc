/**
 * Connection management with retry logic.
 * Owns the broker connection shared by every supervisor of a process.
 */

import amqp from 'amqplib';
import { ConnectionError } from './errors';
import { createLogger, describeError, Logger } from './logger';
import { abortable, sleep } from './sleep';
import { buildUrl } from './config';
import {
  BrokerConfig,
  BrokerConnection,
  BrokerChannel,
  ConnectionOptions,
  RawConnection,
  RawChannel,
} from './types';

const ABORTED_MESSAGE = 'Connection attempt aborted';

interface PendingConnect {
  promise: Promise<void>;
  controller: AbortController;
  waiters: number;
}

/**
 * Attempts to establish a connection with retry logic.
 *
 * @param url - RabbitMQ connection URL
 * @param options - Connection options including retry configuration
 * @param signal - Stops further attempts and retry waits once aborted
 * @returns Promise resolving to the connection
 * @throws ConnectionError if all retry attempts fail or the signal is aborted
 */
export const connectWithRetries = async (
  url: string,
  options: ConnectionOptions = {},
  signal?: AbortSignal
): Promise<RawConnection> => {
  const { retries = 5, retryDelay = 500 } = options;

  let lastError: Error | null = null;
  const maxAttempts = retries === -1 ? Infinity : retries + 1;

  for (let attempt = 1; attempt <= maxAttempts && ! signal?.aborted; attempt++) {
    try {
      return await amqp.connect(url);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt < maxAttempts) {
        await sleep(retryDelay, signal);
      }
    }
  }

  if (signal?.aborted) {
    throw new ConnectionError(ABORTED_MESSAGE, { cause: lastError ?? undefined });
  }

  throw new ConnectionError(
    `Failed to connect to RabbitMQ after ${maxAttempts} attempts: ${lastError?.message}`,
    { cause: lastError }
  );
};

/**
 * Creates a channel from a connection.
 *
 * @param connection - RabbitMQ connection
 * @returns Promise resolving to the channel
 */
export const createChannel = async (connection: Pick<RawConnection, 'createChannel'>): Promise<RawChannel> => {
  const channel = await connection.createChannel();
  channel.setMaxListeners(100);
  return channel;
};

/**
 * Gracefully closes a connection.
 *
 * @param connection - RabbitMQ connection to close
 * @param logger - Receives the close failure, if any
 */
export const closeConnection = async (connection: Pick<RawConnection, 'close'>, logger?: Logger): Promise<void> => {
  try {
    await connection.close();
  } catch (error) {
    logger?.debug('Connection already closed', { reason: describeError(error) });
  }
};

/**
 * Gracefully closes a channel.
 *
 * @param channel - Channel to close
 * @param logger - Receives the close failure, if any
 */
export const closeChannel = async (channel: Pick<BrokerChannel, 'close'>, logger?: Logger): Promise<void> => {
  try {
    await channel.close();
  } catch (error) {
    logger?.debug('Channel already closed', { reason: describeError(error) });
  }
};

/**
 * Broker connection shared by reference between supervisors.
 * Re-established lazily whenever it is found closed.
 */
export class SharedConnection implements BrokerConnection {
  private url: string;
  private options: ConnectionOptions;
  private logger: Logger;
  private connection: RawConnection | null = null;
  private connecting: PendingConnect | null = null;
  private refs = 0;

  constructor(url: string, options: ConnectionOptions = {}) {
    this.url = url;
    this.options = options;
    this.logger = options.logger ?? createLogger('connection');
  }

  /**
   * Creates a shared connection from loaded broker configuration.
   *
   * @param config - Broker configuration
   * @param options - Connection options
   */
  static fromConfig(config: BrokerConfig, options: ConnectionOptions = {}): SharedConnection {
    return new SharedConnection(buildUrl(config), options);
  }

  isLive(): boolean {
    return this.connection !== null;
  }

  /**
   * Establishes the connection unless it is live.
   * Concurrent callers share the same attempt. A caller whose signal aborts
   * stops waiting at once; the attempt itself is abandoned when no caller is
   * left waiting on it.
   *
   * @param signal - Abandons the wait once aborted
   * @throws ConnectionError if the attempt fails or the signal is aborted
   */
  async connect(signal?: AbortSignal): Promise<void> {
    if (this.connection) {
      return;
    }

    const pending = this.connecting;
    const attempt = pending && ! pending.controller.signal.aborted ? pending : this.beginAttempt();
    attempt.waiters++;

    try {
      await (signal
        ? abortable(attempt.promise, signal, () => new ConnectionError(ABORTED_MESSAGE))
        : attempt.promise);
    } finally {
      attempt.waiters--;
      if (attempt.waiters === 0) {
        attempt.controller.abort();
      }
    }
  }

  async openChannel(signal?: AbortSignal): Promise<BrokerChannel> {
    await this.connect(signal);

    if (! this.connection) {
      throw new ConnectionError('Connection closed while opening channel');
    }

    return createChannel(this.connection);
  }

  acquire(): void {
    this.refs++;
  }

  async release(): Promise<void> {
    if (this.refs === 0) {
      return;
    }

    this.refs--;
    if (this.refs === 0) {
      await this.close();
    }
  }

  /**
   * Number of supervisors holding this connection.
   */
  getReferenceCount(): number {
    return this.refs;
  }

  /**
   * Gets the underlying amqplib connection.
   *
   * @returns Connection or null if not connected
   */
  getConnection(): RawConnection | null {
    return this.connection;
  }

  /**
   * Closes the connection, whoever still holds a reference.
   */
  async close(): Promise<void> {
    this.connecting?.controller.abort();

    const connection = this.connection;
    if (! connection) {
      return;
    }

    this.connection = null;
    this.logger.info('Closing RabbitMQ connection');
    await closeConnection(connection, this.logger);
  }

  private beginAttempt(): PendingConnect {
    const controller = new AbortController();
    const attempt: PendingConnect = {
      controller,
      waiters: 0,
      promise: this.attemptConnect(controller.signal).finally(() => {
        if (this.connecting === attempt) {
          this.connecting = null;
        }
      }),
    };

    this.connecting = attempt;
    return attempt;
  }

  private async attemptConnect(signal: AbortSignal): Promise<void> {
    this.logger.debug('Attempting to connect', { retries: this.options.retries ?? 5 });
    const connection = await connectWithRetries(this.url, this.options, signal);

    // nobody is waiting any more, or close() ran meanwhile
    if (signal.aborted) {
      await closeConnection(connection, this.logger);
      throw new ConnectionError(ABORTED_MESSAGE);
    }

    connection.once('close', () => {
      if (this.connection === connection) {
        this.connection = null;
        this.logger.warn('Disconnected from RabbitMQ');
      }
    });
    connection.on('error', (err: Error) => {
      this.logger.error('RabbitMQ connection error', err);
    });

    this.connection = connection;
    this.logger.info('Connected to RabbitMQ');
  }
}
