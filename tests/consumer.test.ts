/**
 * Tests for ConsumerSupervisor and handler isolation.
 */

import { vi, type Mock } from 'vitest';
import { ConsumerSupervisor, runWithRecovery } from '../src/consumer';
import { ChannelOpenError, ConnectionError, ConsumeAttachError, HandlerError, LifecycleError } from '../src/errors';
import { DeliveryInfo, MessageHandler } from '../src/types';
import { FakeBroker } from './fake-broker';
import { createTestLogger } from './test-logger';

const bodies = (handler: Mock<MessageHandler>) =>
  handler.mock.calls.map(([body]) => body.toString('utf-8'));

describe('ConsumerSupervisor', () => {
  let broker: FakeBroker;
  let logger: ReturnType<typeof createTestLogger>;
  let consumers: ConsumerSupervisor;

  beforeEach(async () => {
    broker = new FakeBroker();
    logger = createTestLogger();
    consumers = await ConsumerSupervisor.create(broker, { retryDelay: 5, redialDelay: 5, logger });

    await consumers.getChannel().declareQueue('orders');
    await consumers.getChannel().declareQueue('events');
  });

  afterEach(async () => {
    await consumers.stop().catch(() => undefined);
  });

  describe('create', () => {
    it('should hold a reference on the connection', () => {
      expect(broker.refs).toBe(1);
      expect(consumers.getState()).toBe('idle');
    });

    it('should wrap a setup failure in a ConnectionError', async () => {
      const down = new FakeBroker();
      down.live = false;
      down.connectFailures = 1;

      const attempt = ConsumerSupervisor.create(down, { logger });

      await expect(attempt).rejects.toBeInstanceOf(ConnectionError);
      await expect(attempt).rejects.toThrow('amqp connect error: broker connection error: ECONNREFUSED');
      expect(down.refs).toBe(0);
    });

    it('should keep a channel open failure as the cause', async () => {
      const busy = new FakeBroker();
      busy.openFailures = 1;

      const error = await ConsumerSupervisor.create(busy, { logger }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ConnectionError);
      expect(error).toHaveProperty('message', 'amqp connect error: open channel error: channel limit reached');
      expect(error).toHaveProperty('cause', expect.any(ChannelOpenError));
      expect(busy.refs).toBe(0);
    });
  });

  describe('register', () => {
    it('should return distinct identities for the same label', () => {
      const handler = vi.fn<MessageHandler>();

      const first = consumers.register('orders', 'orders', handler);
      const second = consumers.register('orders', 'orders', handler);

      expect(first).toMatch(/^orders-\d+$/);
      expect(second).toMatch(/^orders-\d+$/);
      expect(Number(second.slice('orders-'.length))).toBe(Number(first.slice('orders-'.length)) + 1);
      expect(consumers.getConsumers()).toEqual(
        new Map([
          [first, 'orders'],
          [second, 'orders'],
        ])
      );
    });

    it('should refuse registration once started', () => {
      consumers.register('orders', 'orders', vi.fn<MessageHandler>());
      consumers.start();

      expect(() => consumers.register('events', 'late', vi.fn<MessageHandler>())).toThrow(LifecycleError);
      expect(() => consumers.register('events', 'late', vi.fn<MessageHandler>())).toThrow(
        "Cannot register consumer 'late' while running"
      );
      expect(consumers.getConsumers().size).toBe(1);
    });
  });

  describe('start', () => {
    it('should attach one broker consumer per binding', async () => {
      const ordersId = consumers.register('orders', 'orders', vi.fn<MessageHandler>());
      const eventsId = consumers.register('events', 'events', vi.fn<MessageHandler>());

      consumers.start();

      await vi.waitFor(() => expect(broker.consumers).toHaveLength(2));
      expect(broker.consumersOf('orders').map((c) => c.tag)).toEqual([ordersId]);
      expect(broker.consumersOf('events').map((c) => c.tag)).toEqual([eventsId]);
      expect(broker.consumeOptions).toContainEqual({
        consumerTag: ordersId,
        noAck: false,
        exclusive: false,
        noLocal: false,
      });
      expect(consumers.getState()).toBe('running');
    });

    it('should be a no-op when already running', async () => {
      consumers.register('orders', 'orders', vi.fn<MessageHandler>());

      consumers.start();
      consumers.start();

      await vi.waitFor(() => expect(broker.consumers).toHaveLength(1));
      const starts = logger.info.mock.calls.filter(([message]) => message === 'Starting consumers');
      expect(starts).toEqual([['Starting consumers', { count: 1 }]]);
    });
  });

  describe('deliveries', () => {
    it('should route each queue to its own handler and ack every delivery', async () => {
      const onOrder = vi.fn<MessageHandler>();
      const onEvent = vi.fn<MessageHandler>();
      consumers.register('orders', 'orders', onOrder);
      consumers.register('events', 'events', onEvent);
      consumers.start();
      await vi.waitFor(() => expect(broker.consumers).toHaveLength(2));

      const channel = consumers.getChannel();
      channel.publish('', 'orders', 'o1');
      channel.publish('', 'orders', 'o2');
      channel.publish('', 'orders', 'o3');
      channel.publish('', 'events', 'e1');
      channel.publish('', 'events', 'e2');

      await vi.waitFor(() => expect(broker.acks).toHaveLength(5));
      expect(bodies(onOrder)).toEqual(['o1', 'o2', 'o3']);
      expect(bodies(onEvent)).toEqual(['e1', 'e2']);
      expect(broker.rejects).toEqual([]);

      await consumers.stop();
      broker.enqueue('orders', 'late');

      expect(onOrder).toHaveBeenCalledTimes(3);
      expect(broker.queues.get('orders')?.messages).toHaveLength(1);
    });

    it('should pass delivery metadata to the handler', async () => {
      const handler = vi.fn<MessageHandler>();
      const consumerId = consumers.register('orders', 'orders', handler);
      consumers.start();
      await vi.waitFor(() => expect(broker.consumers).toHaveLength(1));

      broker.enqueue('orders', 'payload');

      await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(1));
      const [, delivery] = handler.mock.calls[0];
      expect(delivery).toMatchObject({
        consumerTag: consumerId,
        deliveryTag: 1,
        redelivered: false,
        exchange: '',
        routingKey: 'orders',
        contentType: 'text/plain',
      });
    });

    it('should reject a failed delivery with requeue and keep consuming', async () => {
      const handler = vi.fn<MessageHandler>().mockRejectedValueOnce(new Error('boom'));
      const consumerId = consumers.register('orders', 'orders', handler);
      consumers.start();
      await vi.waitFor(() => expect(broker.consumers).toHaveLength(1));

      broker.enqueue('orders', 'bad');
      broker.enqueue('orders', 'good');

      await vi.waitFor(() => expect(broker.acks).toHaveLength(1));
      expect(broker.rejects).toEqual([{ channel: 1, consumerTag: consumerId, body: 'bad', requeue: true }]);
      expect(broker.acks).toEqual([{ channel: 1, consumerTag: consumerId, body: 'good', multiple: false }]);
      expect(logger.error).toHaveBeenCalledWith(
        'Handler failed',
        expect.objectContaining({ consumer: consumerId, deliveryTag: 1, error: 'boom' })
      );
    });

    it('should never ack deliveries of an always-failing handler', async () => {
      const handler = vi.fn<MessageHandler>(() => {
        throw new Error('always broken');
      });
      consumers.register('orders', 'orders', handler);
      consumers.start();
      await vi.waitFor(() => expect(broker.consumers).toHaveLength(1));

      broker.enqueue('orders', 'a');
      broker.enqueue('orders', 'b');

      await vi.waitFor(() => expect(broker.rejects).toHaveLength(2));
      expect(broker.rejects.map((r) => r.requeue)).toEqual([true, true]);
      expect(broker.acks).toEqual([]);
      expect(consumers.getState()).toBe('running');
    });

    it('should isolate a failing consumer from its siblings', async () => {
      const broken = vi.fn<MessageHandler>().mockRejectedValue(new Error('broken'));
      const healthy = vi.fn<MessageHandler>();
      consumers.register('orders', 'orders', broken);
      consumers.register('events', 'events', healthy);
      consumers.start();
      await vi.waitFor(() => expect(broker.consumers).toHaveLength(2));

      broker.enqueue('orders', 'o1');
      broker.enqueue('events', 'e1');
      broker.enqueue('events', 'e2');

      await vi.waitFor(() => expect(broker.acks).toHaveLength(2));
      await vi.waitFor(() => expect(broker.rejects).toHaveLength(1));
      expect(broker.acks.map((a) => a.body)).toEqual(['e1', 'e2']);
      expect(broker.rejects.map((r) => r.body)).toEqual(['o1']);
    });
  });

  describe('recovery', () => {
    it('should re-attach on the re-dialed channel after a channel closure', async () => {
      const handler = vi.fn<MessageHandler>();
      const consumerId = consumers.register('orders', 'orders', handler);
      consumers.start();
      await vi.waitFor(() => expect(broker.consumers).toHaveLength(1));

      broker.latestChannel.fail(new Error('CHANNEL_ERROR - expected'));

      await vi.waitFor(() => expect(broker.consumers.map((c) => c.channel.id)).toEqual([2]));
      broker.enqueue('orders', 'after');

      await vi.waitFor(() => expect(broker.acks).toHaveLength(1));
      expect(broker.acks[0]).toEqual({ channel: 2, consumerTag: consumerId, body: 'after', multiple: false });
    });

    it('should redeliver a message left unacked by a channel closure', async () => {
      let release: () => void = () => undefined;
      const handler = vi.fn<MessageHandler>().mockImplementationOnce(
        () =>
          new Promise<void>((resolve) => {
            release = resolve;
          })
      );
      consumers.register('orders', 'orders', handler);
      consumers.start();
      await vi.waitFor(() => expect(broker.consumers).toHaveLength(1));

      broker.enqueue('orders', 'in-flight');
      await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(1));

      broker.latestChannel.fail(new Error('CHANNEL_ERROR - expected'));
      release();

      await vi.waitFor(() => expect(broker.acks).toHaveLength(1));
      expect(broker.acks[0]).toMatchObject({ channel: 2, body: 'in-flight' });
      expect(handler.mock.calls[1][1].redelivered).toBe(true);
      expect(logger.error).toHaveBeenCalledWith('Delivery settle error', expect.any(Error));
    });

    it('should retry a failed attach', async () => {
      broker.consumeFailures = 2;
      consumers.register('orders', 'orders', vi.fn<MessageHandler>());

      consumers.start();

      await vi.waitFor(() => expect(broker.consumers).toHaveLength(1));
      const runErrors = logger.error.mock.calls.filter(([message]) => message === 'Run error');
      expect(runErrors).toHaveLength(2);
      expect(runErrors[0][1]).toBeInstanceOf(ConsumeAttachError);
      expect(runErrors[0][1].message).toBe('amqp consume orders error: consume refused');
    });

    it('should keep retrying until its queue exists', async () => {
      consumers.register('audit', 'audit', vi.fn<MessageHandler>());
      consumers.start();

      await vi.waitFor(() => expect(logger.error).toHaveBeenCalledTimes(2));
      await consumers.getChannel().declareQueue('audit');

      await vi.waitFor(() => expect(broker.consumersOf('audit')).toHaveLength(1));
    });
  });

  describe('stop', () => {
    it('should cancel every consumer, close the channel and release the connection', async () => {
      const ordersId = consumers.register('orders', 'orders', vi.fn<MessageHandler>());
      const eventsId = consumers.register('events', 'events', vi.fn<MessageHandler>());
      consumers.start();
      await vi.waitFor(() => expect(broker.consumers).toHaveLength(2));

      await consumers.stop();

      expect(broker.cancelled.slice().sort()).toEqual([ordersId, eventsId].sort());
      expect(broker.consumers).toEqual([]);
      expect(consumers.getChannel().isOpen()).toBe(false);
      expect(consumers.getChannel().isClosed()).toBe(true);
      expect(consumers.getState()).toBe('stopped');
      expect(broker.refs).toBe(0);
      expect(logger.info).toHaveBeenCalledWith('Consumers stopped');
    });

    it('should return the same promise on repeated calls', async () => {
      consumers.register('orders', 'orders', vi.fn<MessageHandler>());
      consumers.start();

      const first = consumers.stop();
      const second = consumers.stop();

      expect(second).toBe(first);
      await first;
      expect(broker.refs).toBe(0);
    });

    it('should cancel a consumer that attaches after stop', async () => {
      let attach: () => void = () => undefined;
      broker.consumeGate = new Promise<void>((resolve) => {
        attach = resolve;
      });
      const consumerId = consumers.register('orders', 'orders', vi.fn<MessageHandler>());
      consumers.start();
      expect(broker.consumeCalls).toBe(1);

      const stopped = consumers.stop();
      expect(broker.cancelled).toEqual([consumerId]);

      attach();
      await stopped;

      expect(broker.cancelled).toEqual([consumerId, consumerId]);
      expect(broker.consumers).toEqual([]);
      expect(logger.warn).not.toHaveBeenCalledWith('Cancel after stop failed', expect.anything());
      expect(consumers.getState()).toBe('stopped');
    });

    it('should let an in-flight handler finish and settle', async () => {
      let release: () => void = () => undefined;
      const handler = vi.fn<MessageHandler>(
        () =>
          new Promise<void>((resolve) => {
            release = resolve;
          })
      );
      consumers.register('orders', 'orders', handler);
      consumers.start();
      await vi.waitFor(() => expect(broker.consumers).toHaveLength(1));
      broker.enqueue('orders', 'slow');
      await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(1));

      const stopped = consumers.stop();
      expect(consumers.getState()).toBe('stopping');

      release();
      await stopped;

      expect(broker.acks.map((a) => a.body)).toEqual(['slow']);
      expect(consumers.getState()).toBe('stopped');
    });

    it('should log a failed cancel and still shut down', async () => {
      const consumerId = consumers.register('orders', 'orders', vi.fn<MessageHandler>());
      consumers.start();
      await vi.waitFor(() => expect(broker.consumers).toHaveLength(1));
      broker.cancelFailures = 1;

      await consumers.stop();

      expect(logger.warn).toHaveBeenCalledWith('Cancel failed', {
        consumer: consumerId,
        reason: `cancel consumer ${consumerId} error: cancel timed out`,
      });
      expect(consumers.getState()).toBe('stopped');
    });

    it('should stop a supervisor that never started', async () => {
      consumers.register('orders', 'orders', vi.fn<MessageHandler>());

      await consumers.stop();

      expect(consumers.getState()).toBe('stopped');
      expect(broker.consumers).toEqual([]);
      expect(broker.refs).toBe(0);
    });

    it('should not start after stopping', async () => {
      consumers.register('orders', 'orders', vi.fn<MessageHandler>());
      await consumers.stop();

      consumers.start();

      expect(consumers.getState()).toBe('stopped');
      expect(broker.consumers).toEqual([]);
    });
  });
});

describe('runWithRecovery', () => {
  const delivery: DeliveryInfo = {
    body: Buffer.from('payload', 'utf-8'),
    consumerTag: 'worker-1',
    deliveryTag: 7,
    redelivered: false,
    exchange: 'orders',
    routingKey: 'order.created',
  };

  it('should report success and pass the body and delivery', async () => {
    const handler = vi.fn<MessageHandler>();

    const result = await runWithRecovery(handler, delivery, createTestLogger());

    expect(result).toEqual({ ok: true });
    expect(handler).toHaveBeenCalledWith(delivery.body, delivery);
  });

  it('should turn a throw into a HandlerError', async () => {
    const fault = new Error('boom');
    const logger = createTestLogger();

    const result = await runWithRecovery(
      () => {
        throw fault;
      },
      delivery,
      logger
    );

    if (result.ok) {
      throw new Error('expected a failed result');
    }
    expect(result.error).toBeInstanceOf(HandlerError);
    expect(result.error.message).toBe('handler worker-1 failed: boom');
    expect(result.error.consumer).toBe('worker-1');
    expect(result.error.trace).toBe(fault.stack);
    expect(result.error.cause).toBe(fault);
    expect(result.error.code).toBe('HANDLER_ERROR');
    expect(logger.error).toHaveBeenCalledWith('Handler failed', {
      consumer: 'worker-1',
      deliveryTag: 7,
      error: 'boom',
      trace: fault.stack,
    });
  });

  it('should contain a rejected promise', async () => {
    const result = await runWithRecovery(
      async () => {
        throw new Error('async boom');
      },
      delivery,
      createTestLogger()
    );

    expect(result.ok).toBe(false);
  });

  it('should contain a thrown non-error value', async () => {
    const result = await runWithRecovery(
      () => {
        throw 'plain failure';
      },
      delivery,
      createTestLogger()
    );

    if (result.ok) {
      throw new Error('expected a failed result');
    }
    expect(result.error.message).toBe('handler worker-1 failed: plain failure');
    expect(result.error.trace).toBe('plain failure');
  });

  it('should cap the captured trace at 64 KiB', async () => {
    const fault = new Error('deep');
    fault.stack = 'x'.repeat(70_000);

    const result = await runWithRecovery(
      () => {
        throw fault;
      },
      delivery,
      createTestLogger()
    );

    if (result.ok) {
      throw new Error('expected a failed result');
    }
    expect(result.error.trace).toHaveLength(65_536);
  });
});
