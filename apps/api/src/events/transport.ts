import type { Topic } from '@relaydesk/shared';

/**
 * Receives the event exactly as it came off the wire. Throwing asks the
 * transport to redeliver.
 */
export type RawEventHandler = (payload: unknown) => Promise<void>;

/**
 * At-least-once pub/sub over named topics
 */
export interface EventTransport {
  readonly name: string;

  /** Resolves once the transport has accepted the event */
  publish(topic: Topic, eventId: string, payload: object): Promise<void>;

  subscribe(topic: Topic, handler: RawEventHandler): void;

  close(): Promise<void>;
}
