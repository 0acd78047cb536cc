/**
 * Error taxonomy for the supervised AMQP client.
 *
 * Setup-time failures are thrown to the caller; the same failures met by a
 * background task (re-dial, consumer loops) are logged and retried.
 */

export type BrokerErrorCode =
  | 'CONNECTION_ERROR'
  | 'CHANNEL_OPEN_ERROR'
  | 'CONSUME_ATTACH_ERROR'
  | 'HANDLER_ERROR'
  | 'DELIVERY_ACK_ERROR'
  | 'CANCEL_ERROR'
  | 'CLOSE_ERROR'
  | 'LIFECYCLE_ERROR';

export class BrokerError extends Error {
  readonly code: BrokerErrorCode;

  constructor(message: string, code: BrokerErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The shared broker connection could not be (re-)established. */
export class ConnectionError extends BrokerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONNECTION_ERROR', options);
  }
}

/** Opening a channel on a live connection failed. */
export class ChannelOpenError extends BrokerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CHANNEL_OPEN_ERROR', options);
  }
}

/** A consumer could not obtain its delivery stream. */
export class ConsumeAttachError extends BrokerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONSUME_ATTACH_ERROR', options);
  }
}

/**
 * A message handler failed. Carries the consumer identity and the stack of
 * the original fault.
 */
export class HandlerError extends BrokerError {
  readonly consumer: string;
  readonly trace: string;

  constructor(message: string, consumer: string, trace: string, options?: { cause?: unknown }) {
    super(message, 'HANDLER_ERROR', options);
    this.consumer = consumer;
    this.trace = trace;
  }
}

export class DeliveryAckError extends BrokerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'DELIVERY_ACK_ERROR', options);
  }
}

export class CancelError extends BrokerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CANCEL_ERROR', options);
  }
}

export class CloseError extends BrokerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CLOSE_ERROR', options);
  }
}

/** An operation was attempted in a lifecycle state that does not allow it. */
export class LifecycleError extends BrokerError {
  constructor(message: string) {
    super(message, 'LIFECYCLE_ERROR');
  }
}
