import { ConnectionError } from '@utils/errors';
import type {
  ConnectionHandlers,
  ConnectOptions,
  IBrokerConnection,
  IBrokerTransport,
  PublishOptions,
  Subscription,
  Will,
} from '../IBrokerTransport';
import { MQTT_SYNTAX } from '../topics';

export type PublishedMessage = { topic: string; payload: string; options: PublishOptions };

type Hook<T> = (value: T) => void | Promise<void>;

export class FakeBrokerConnection implements IBrokerConnection {
  closed = false;

  constructor(private readonly broker: FakeBrokerTransport, readonly handlers: ConnectionHandlers) {}

  async declare(subscription: Subscription) {
    this.broker.events.push(`declare:${subscription.routing}`);
    await this.broker.onDeclare?.(subscription);
    this.broker.declared.push(subscription);
  }

  async undeclare(subscription: Subscription) {
    this.broker.events.push(`undeclare:${subscription.routing}`);
    this.broker.undeclared.push(subscription);
  }

  async publish(topic: string, payload: string, options: PublishOptions) {
    this.broker.events.push(`publish:${topic}`);
    this.broker.publishAttempts++;
    await this.broker.onPublish?.(topic);
    this.broker.published.push({ topic, payload, options });
  }

  async close() {
    this.closed = true;
  }
}

/** In-process broker stand-in. Records every interaction in call order. */
export class FakeBrokerTransport implements IBrokerTransport {
  readonly syntax = MQTT_SYNTAX;
  reachable = true;
  connectAttempts = 0;
  publishAttempts = 0;
  lastWill?: Will;
  readonly connections: FakeBrokerConnection[] = [];
  readonly declared: Subscription[] = [];
  readonly undeclared: Subscription[] = [];
  readonly published: PublishedMessage[] = [];
  readonly events: string[] = [];
  onDeclare?: Hook<Subscription>;
  onPublish?: Hook<string>;

  toString() {
    return 'fake://broker';
  }

  get current(): FakeBrokerConnection | undefined {
    const last = this.connections[this.connections.length - 1];
    return last && !last.closed ? last : undefined;
  }

  async connect({ handlers, will, signal }: ConnectOptions): Promise<IBrokerConnection> {
    this.connectAttempts++;
    if (signal.aborted) throw signal.reason;
    if (!this.reachable) throw new ConnectionError('Broker unreachable');

    this.events.push('connect');
    this.lastWill = will;
    const connection = new FakeBrokerConnection(this, handlers);
    this.connections.push(connection);
    return connection;
  }

  /** Simulates the broker going away underneath the live connection. */
  drop() {
    const connection = this.current;
    if (!connection) return;
    connection.closed = true;
    this.events.push('drop');
    connection.handlers.onClose(new ConnectionError('Connection reset'));
  }

  deliver(topic: string, payload: string, ack?: () => void) {
    const connection = this.current;
    if (!connection) throw new Error('Not connected');
    connection.handlers.onMessage({ topic, payload: Buffer.from(payload), ack });
  }

  declaredRoutings(): string[] {
    return this.declared.map((subscription) => subscription.routing);
  }
}
