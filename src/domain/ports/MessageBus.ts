/** Fan-out of domain events to whoever listens on a channel. */
export interface MessageBus {
  publish(channel: string, event: object): Promise<void>;
}
