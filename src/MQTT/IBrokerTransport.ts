import type { QoS } from '@utils/options';
import type { TopicSyntax } from './topics';

export type ExchangeKind = 'topic' | 'fanout' | 'direct';

/** A broker-side binding. `exchange` is the exchange or topic root, `routing` the filter below it. */
export interface Subscription {
  readonly exchange: string;
  readonly routing: string;
  readonly kind: ExchangeKind;
  readonly qos: QoS;
}

export type PublishOptions = { qos: QoS; retain: boolean };

export type Will = { topic: string; payload: string; qos: QoS; retain: boolean };

export interface InboundMessage {
  topic: string;
  payload: Buffer;
  /** Acknowledges the message to the broker, for protocols that need it. */
  ack?: () => void;
}

export interface ConnectionHandlers {
  onMessage(message: InboundMessage): void;
  /** Called once when the broker side goes away after a successful connect. */
  onClose(error?: Error): void;
}

export interface ConnectOptions {
  handlers: ConnectionHandlers;
  will?: Will;
  signal: AbortSignal;
}

/**
 * One live session with the broker.
 * Only the connection manager's serve loop calls into it.
 */
export interface IBrokerConnection {
  readonly closed: boolean;
  declare(subscription: Subscription): Promise<void>;
  undeclare(subscription: Subscription): Promise<void>;
  publish(topic: string, payload: string, options: PublishOptions): Promise<void>;
  /** Closes the session. Never throws. */
  close(): Promise<void>;
}

/** Protocol adapter: knows how to open a session and which wildcard syntax the broker uses. */
export interface IBrokerTransport {
  readonly syntax: TopicSyntax;
  connect(options: ConnectOptions): Promise<IBrokerConnection>;
  toString(): string;
}
