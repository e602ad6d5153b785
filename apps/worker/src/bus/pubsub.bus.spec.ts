import { EventEmitter } from 'node:events';
import type { PubSub } from '@google-cloud/pubsub';
import type { BusMessage } from './bus.types';
import { PubSubMessageBus } from './pubsub.bus';

class FakeSubscription extends EventEmitter {
  close = jest.fn().mockResolvedValue(undefined);
}

describe('PubSubMessageBus', () => {
  let subscription: FakeSubscription;
  let topic: { publishMessage: jest.Mock; flush: jest.Mock };
  let client: { subscription: jest.Mock; topic: jest.Mock; close: jest.Mock };
  let bus: PubSubMessageBus;

  beforeEach(() => {
    subscription = new FakeSubscription();
    topic = {
      publishMessage: jest.fn().mockResolvedValue('server-id-1'),
      flush: jest.fn().mockResolvedValue(undefined),
    };
    client = {
      subscription: jest.fn().mockReturnValue(subscription),
      topic: jest.fn().mockReturnValue(topic),
      close: jest.fn().mockResolvedValue(undefined),
    };
    bus = new PubSubMessageBus(
      { projectId: 'demo-project', credentialsPath: null },
      client as unknown as PubSub,
    );
  });

  it('opens the subscription with flow control', () => {
    bus.subscribe('crawl-sub', { maxInFlight: 1 }, () => undefined);

    expect(client.subscription).toHaveBeenCalledWith(
      'crawl-sub',
      expect.objectContaining({
        flowControl: { maxMessages: 1, allowExcessMessages: false },
      }),
    );
  });

  it('adapts delivered messages', () => {
    const received: BusMessage[] = [];
    bus.subscribe('crawl-sub', { maxInFlight: 1 }, (message) => received.push(message));
    const raw = {
      id: 'm-1',
      attributes: { retry_count: '1' },
      data: Buffer.from('{}'),
      ack: jest.fn(),
      nack: jest.fn(),
    };

    subscription.emit('message', raw);
    received[0].ack();
    received[0].nack();

    expect(received[0].id).toBe('m-1');
    expect(received[0].attributes).toEqual({ retry_count: '1' });
    expect(received[0].body.toString()).toBe('{}');
    expect(raw.ack).toHaveBeenCalledTimes(1);
    expect(raw.nack).toHaveBeenCalledTimes(1);
  });

  it('forwards stream errors', () => {
    const onError = jest.fn();
    bus.subscribe('crawl-sub', { maxInFlight: 1, onError }, () => undefined);
    const error = new Error('stream reset');

    subscription.emit('error', error);

    expect(onError).toHaveBeenCalledWith(error);
  });

  it('stops delivering after close', async () => {
    const onMessage = jest.fn();
    const handle = bus.subscribe('crawl-sub', { maxInFlight: 1 }, onMessage);

    await handle.close();
    subscription.emit('message', { id: 'late', attributes: {}, data: Buffer.alloc(0) });

    expect(subscription.close).toHaveBeenCalledTimes(1);
    expect(onMessage).not.toHaveBeenCalled();
  });

  it('publishes through a cached topic handle', async () => {
    await expect(bus.publish('crawl-retry', Buffer.from('a'), { retry_count: '1' })).resolves.toBe(
      'server-id-1',
    );
    await bus.publish('crawl-retry', Buffer.from('b'), {});

    expect(client.topic).toHaveBeenCalledTimes(1);
    expect(topic.publishMessage).toHaveBeenCalledWith({
      data: Buffer.from('a'),
      attributes: { retry_count: '1' },
    });
  });

  it('flushes topics and closes the client', async () => {
    await bus.publish('crawl-retry', Buffer.from('a'), {});
    await bus.close();

    expect(topic.flush).toHaveBeenCalledTimes(1);
    expect(client.close).toHaveBeenCalledTimes(1);
  });
});
