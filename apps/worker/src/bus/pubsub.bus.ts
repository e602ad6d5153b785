import { Duration, type Message, PubSub, type Topic } from '@google-cloud/pubsub';
import type {
  BusMessage,
  BusSubscription,
  MessageBus,
  SubscribeOptions,
} from './bus.types';

// Deliveries wait unacked while the previous job runs; keep their lease.
const MAX_LEASE_EXTENSION = Duration.from({ hours: 24 });

export type PubSubBusOptions = {
  projectId: string;
  credentialsPath: string | null;
};

export function toBusMessage(message: Message): BusMessage {
  return {
    id: message.id,
    attributes: { ...(message.attributes ?? {}) },
    body: message.data ?? Buffer.alloc(0),
    ack: () => message.ack(),
    nack: () => message.nack(),
  };
}

/**
 * MessageBus backed by Google Cloud Pub/Sub streaming pull.
 */
export class PubSubMessageBus implements MessageBus {
  private readonly client: PubSub;
  private readonly topics = new Map<string, Topic>();

  constructor(options: PubSubBusOptions, client?: PubSub) {
    this.client =
      client ??
      new PubSub({
        projectId: options.projectId,
        ...(options.credentialsPath ? { keyFilename: options.credentialsPath } : {}),
      });
  }

  subscribe(
    name: string,
    options: SubscribeOptions,
    onMessage: (message: BusMessage) => void,
  ): BusSubscription {
    const subscription = this.client.subscription(name, {
      flowControl: {
        maxMessages: options.maxInFlight,
        allowExcessMessages: false,
      },
      maxExtensionTime: MAX_LEASE_EXTENSION,
    });

    subscription.on('message', (message: Message) => onMessage(toBusMessage(message)));
    subscription.on('error', (error: Error) => options.onError?.(error));

    return {
      close: async () => {
        subscription.removeAllListeners('message');
        await subscription.close();
      },
    };
  }

  async publish(
    topic: string,
    body: Buffer,
    attributes: Record<string, string>,
  ): Promise<string> {
    let handle = this.topics.get(topic);
    if (!handle) {
      handle = this.client.topic(topic);
      this.topics.set(topic, handle);
    }
    return handle.publishMessage({ data: body, attributes });
  }

  async close(): Promise<void> {
    await Promise.all([...this.topics.values()].map((topic) => topic.flush()));
    await this.client.close();
  }
}
