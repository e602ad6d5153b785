export type BusMessage = {
  id: string;
  attributes: Record<string, string>;
  body: Buffer;
  ack(): void;
  nack(): void;
};

export type SubscribeOptions = {
  /** Deliveries the client may hold before earlier ones are acked. */
  maxInFlight: number;
  onError?: (error: Error) => void;
};

export interface BusSubscription {
  close(): Promise<void>;
}

export interface MessageBus {
  subscribe(
    name: string,
    options: SubscribeOptions,
    onMessage: (message: BusMessage) => void,
  ): BusSubscription;

  /** Resolves with the id the bus assigned to the published message. */
  publish(
    topic: string,
    body: Buffer,
    attributes: Record<string, string>,
  ): Promise<string>;

  /** Flushes pending publishes and releases the client. */
  close(): Promise<void>;
}

export const MESSAGE_BUS = Symbol('MESSAGE_BUS');
