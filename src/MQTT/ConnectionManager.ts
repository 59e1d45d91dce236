import { Repeater, type IRepeatable, type RepeaterContext } from '../Repeater/Repeater';
import { getScheduler } from '../Scheduler/TaskScheduler';
import type { Application } from '../Service/Application';
import type { Feature } from '../Service/Feature';
import { linkSignals } from '@utils/abort';
import { AsyncQueue } from '@utils/AsyncQueue';
import { Deferred } from '@utils/deferred';
import { CallbackError, ConnectionError, errorMessage } from '@utils/errors';
import { logDebug, logError, logInfo, logWarn } from '@utils/logger';
import type { QoS } from '@utils/options';
import type { EventData } from '@utils/options.schema';
import { isTransientError, retryWithBackoff } from '@utils/retryWithBackoff';
import { wait } from '@utils/wait';
import { withTimeout } from '@utils/withTimeout';
import type {
  ExchangeKind,
  IBrokerConnection,
  IBrokerTransport,
  InboundMessage,
  PublishOptions,
  Subscription,
  Will,
} from './IBrokerTransport';
import { topicMatches } from './topics';

export type ConnectionState = 'Idle' | 'Connecting' | 'Ready' | 'Disconnected' | 'Closed';

export type ListenerCallback = (topic: string, payload: EventData) => Promise<void> | void;

export interface Listener {
  readonly pattern: string;
  readonly callback: ListenerCallback;
}

type DeclareOperation = { kind: 'declare'; subscription: Subscription };
type UndeclareOperation = { kind: 'undeclare'; subscription: Subscription };
type PublishOperation = {
  kind: 'publish';
  topic: string;
  payload: string;
  options: PublishOptions;
  timeoutMs: number;
  result: Deferred<void>;
};

export type PendingOperation = DeclareOperation | UndeclareOperation | PublishOperation;

export interface ConnectionManagerOptions {
  /** Pause between a failed or lost connection and the next attempt. */
  reconnectIntervalMs: number;
  /** Upper bound on an idle wait for pending operations, after which liveness is rechecked. */
  pendingWaitMs: number;
  /** Bound on a single broker round-trip (declare, publish). */
  interactionTimeoutMs: number;
}

export type PublishCallOptions = {
  qos?: QoS;
  retain?: boolean;
  timeoutMs?: number;
  /** When false, failures are logged and the call returns normally. */
  err?: boolean;
};

export const encodePayload = (message: EventData | undefined): string =>
  message === undefined || message === null ? '' : JSON.stringify(message);

/** Empty payloads decode to null. Throws on invalid JSON. */
export const decodePayload = (payload: Buffer): EventData => {
  const text = payload.toString();
  if (text.length === 0) return null;
  const data: EventData = JSON.parse(text);
  return data;
};

const sameBinding = (a: Subscription, exchange: string, routing: string) =>
  a.exchange === exchange && a.routing === routing;

const describe = ({ exchange, routing, kind }: Subscription) => `${routing} @ ${exchange || '<root>'} (${kind})`;

/**
 * Keeps a single connection to the message broker alive and multiplexes subscribe, listen and
 * publish calls over it.
 *
 * Callers may use it at any time, before or after the connection exists. Subscriptions are
 * remembered and redeclared on every reconnect; listeners are local and matched against
 * inbound topics with the broker's wildcard syntax.
 *
 * Only the background serve loop touches the live connection. Everything else talks to it through
 * the pending queue, or by swapping the copy-on-write subscription and listener arrays.
 */
export class ConnectionManager implements Feature, IRepeatable {
  readonly name = 'ConnectionManager';
  private readonly repeater = new Repeater(this);
  private readonly pending = new AsyncQueue<PendingOperation>();
  private subscriptions: readonly Subscription[] = [];
  private listeners: readonly Listener[] = [];
  private currentState: ConnectionState = 'Idle';
  private will?: Will;
  private started = false;
  private lastOk = true;

  constructor(private readonly transport: IBrokerTransport, private readonly options: ConnectionManagerOptions) {}

  toString() {
    return `<ConnectionManager for ${this.transport}>`;
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  get connected(): boolean {
    return this.currentState === 'Ready';
  }

  get syntax() {
    return this.transport.syntax;
  }

  private get cycleActive(): boolean {
    return this.currentState === 'Connecting' || this.currentState === 'Ready';
  }

  get active(): boolean {
    return this.repeater.active;
  }

  /** Registered subscriptions, oldest first. */
  get registeredSubscriptions(): readonly Subscription[] {
    return this.subscriptions;
  }

  async startup(app: Application) {
    this.started = true;
    await this.repeater.start(app);
  }

  async shutdown(app: Application) {
    await this.repeater.stop(app);
    this.currentState = 'Closed';
    this.abandonPending();
  }

  /** Sets the MQTT Last Will and Testament. Must be called before startup. */
  setClientWill(topic: string, message?: EventData, { qos = 0, retain = false }: { qos?: QoS; retain?: boolean } = {}) {
    if (this.started) throw new Error('Client will must be set before startup');
    this.will = { topic, payload: encodePayload(message), qos, retain };
  }

  async prepare(_ctx: RepeaterContext) {
    this.currentState = 'Idle';
    logInfo(`[MQTT] Starting ${this}`);
  }

  /** One reconnect-and-serve cycle. The repeater calls this again when it returns. */
  async run({ app, signal }: RepeaterContext) {
    const lost = new AbortController();
    const cycle = linkSignals(signal, lost.signal);
    let connection: IBrokerConnection | undefined;

    try {
      this.currentState = 'Connecting';
      connection = await this.transport.connect({
        handlers: {
          onMessage: (message) => this.onMessage(app, message),
          onClose: (error) => lost.abort(error ?? new ConnectionError(`Connection to ${this.transport} closed`)),
        },
        will: this.will,
        signal: cycle.signal,
      });

      // Subscribing during this loop swaps the array: new entries arrive through the queue instead
      const declared = new Set<Subscription>();
      for (const subscription of this.subscriptions) {
        await this.declare(connection, subscription, cycle.signal);
        declared.add(subscription);
      }

      this.currentState = 'Ready';
      if (this.lastOk) {
        logInfo(`[MQTT] ${this} connected`);
      } else {
        logInfo(`[MQTT] ${this} reconnected`);
        this.lastOk = true;
      }

      await this.serve(connection, declared, cycle.signal);
    } catch (error) {
      if (signal.aborted) throw error;
      if (this.lastOk) {
        logWarn(`[MQTT] Connection error in ${this}: ${errorMessage(error)}`);
        this.lastOk = false;
      }
    } finally {
      cycle.dispose();
      this.currentState = signal.aborted ? 'Closed' : 'Disconnected';
      await connection?.close();
      this.abandonPending();
    }

    await wait(this.options.reconnectIntervalMs, signal);
  }

  subscribe(exchange: string, routing: string, kind: ExchangeKind = 'topic', qos: QoS = 0): Subscription {
    const existing = this.subscriptions.find((s) => sameBinding(s, exchange, routing));
    if (existing) return existing;

    const subscription: Subscription = { exchange, routing, kind, qos };
    this.subscriptions = [...this.subscriptions, subscription];
    this.pending.put({ kind: 'declare', subscription });

    if (this.connected) {
      logInfo(`[MQTT] subscribe(${describe(subscription)})`);
    } else {
      logInfo(`[MQTT] Deferred subscribe(${describe(subscription)})`);
    }
    return subscription;
  }

  /** Does nothing if no such subscription exists. */
  unsubscribe(exchange: string, routing: string) {
    const subscription = this.subscriptions.find((s) => sameBinding(s, exchange, routing));
    if (!subscription) return;

    logInfo(`[MQTT] unsubscribe(${describe(subscription)})`);
    this.subscriptions = this.subscriptions.filter((s) => s !== subscription);
    // A cycle still connecting may already have declared it
    if (this.cycleActive) this.pending.put({ kind: 'undeclare', subscription });
  }

  listen(pattern: string, callback: ListenerCallback) {
    logInfo(`[MQTT] listen(${pattern})`);
    this.listeners = [...this.listeners, { pattern, callback }];
  }

  /** Both `pattern` and `callback` must match. Does nothing if no such listener exists. */
  unlisten(pattern: string, callback: ListenerCallback) {
    const index = this.listeners.findIndex((l) => l.pattern === pattern && l.callback === callback);
    if (index === -1) return;

    logInfo(`[MQTT] unlisten(${pattern})`);
    this.listeners = [...this.listeners.slice(0, index), ...this.listeners.slice(index + 1)];
  }

  /**
   * Publishes `message` as JSON. Fails fast with a ConnectionError when not connected.
   * Connection errors and timeouts are retried once; rejections by the broker are not.
   */
  async publish(topic: string, message: EventData | undefined, options: PublishCallOptions = {}) {
    const { qos = 0, retain = false, timeoutMs = this.options.interactionTimeoutMs, err = true } = options;
    const payload = encodePayload(message);

    try {
      await retryWithBackoff(() => this.attemptPublish(topic, payload, { qos, retain }, timeoutMs), {
        maxRetries: 2,
        initialDelayMs: 0,
        isRetryableError: isTransientError,
        onRetry: (error) => logDebug(`[MQTT] Retrying publish(${topic}): ${errorMessage(error)}`),
      });
      logDebug(`[MQTT] publish(${topic})`);
    } catch (error) {
      if (err) throw error;
      logDebug(`[MQTT] Dropped publish(${topic}): ${errorMessage(error)}`);
    }
  }

  private async attemptPublish(topic: string, payload: string, options: PublishOptions, timeoutMs: number) {
    if (!this.connected) throw new ConnectionError(`Not connected to ${this.transport}`);

    const result = new Deferred<void>();
    const operation: PublishOperation = { kind: 'publish', topic, payload, options, timeoutMs, result };
    this.pending.put(operation);
    try {
      await withTimeout(result, timeoutMs, `publish(${topic})`);
    } catch (error) {
      // A timed-out attempt is never sent
      this.pending.remove((op) => op === operation);
      result.reject(error);
      throw error;
    }
  }

  private async serve(connection: IBrokerConnection, declared: Set<Subscription>, signal: AbortSignal) {
    for (;;) {
      if (connection.closed) throw new ConnectionError(`Connection to ${this.transport} lost`);

      const operation = await this.pending.get(this.options.pendingWaitMs, signal);
      if (operation === undefined) continue;

      switch (operation.kind) {
        case 'declare':
          await this.applyDeclare(connection, operation, declared, signal);
          break;
        case 'undeclare':
          await this.applyUndeclare(connection, operation, declared, signal);
          break;
        case 'publish':
          await this.applyPublish(connection, operation, signal);
          break;
      }
    }
  }

  private async declare(connection: IBrokerConnection, subscription: Subscription, signal: AbortSignal) {
    await withTimeout(
      connection.declare(subscription),
      this.options.interactionTimeoutMs,
      `declare(${describe(subscription)})`,
      signal
    );
    logDebug(`[MQTT] Declared ${describe(subscription)}`);
  }

  private async applyDeclare(
    connection: IBrokerConnection,
    operation: DeclareOperation,
    declared: Set<Subscription>,
    signal: AbortSignal
  ) {
    const { subscription } = operation;
    if (declared.has(subscription) || !this.subscriptions.includes(subscription)) return;

    try {
      await this.declare(connection, subscription, signal);
      declared.add(subscription);
    } catch (error) {
      // Put it back and reconnect: the next cycle declares the whole registry from scratch
      this.pending.put(operation);
      throw error;
    }
  }

  private async applyUndeclare(
    connection: IBrokerConnection,
    { subscription }: UndeclareOperation,
    declared: Set<Subscription>,
    signal: AbortSignal
  ) {
    declared.delete(subscription);
    try {
      await withTimeout(
        connection.undeclare(subscription),
        this.options.interactionTimeoutMs,
        `undeclare(${describe(subscription)})`,
        signal
      );
    } catch (error) {
      if (signal.aborted) throw error;
      logWarn(`[MQTT] Failed to undeclare ${describe(subscription)}: ${errorMessage(error)}`);
    }
  }

  private async applyPublish(connection: IBrokerConnection, operation: PublishOperation, signal: AbortSignal) {
    const { topic, payload, options, timeoutMs, result } = operation;
    if (result.isSettled) return;
    try {
      await withTimeout(connection.publish(topic, payload, options), timeoutMs, `publish(${topic})`, signal);
      result.resolve();
    } catch (error) {
      if (signal.aborted) {
        result.reject(new ConnectionError(`Connection to ${this.transport} lost during publish(${topic})`));
        throw error;
      }
      result.reject(error);
    }
  }

  /** Publishes and unbinds are tied to the connection they were queued for. Declares survive. */
  private abandonPending() {
    for (const operation of this.pending.remove((op) => op.kind !== 'declare')) {
      if (operation.kind === 'publish') {
        operation.result.reject(new ConnectionError(`Not connected to ${this.transport}`));
      }
    }
  }

  private onMessage(app: Application, message: InboundMessage) {
    const { topic } = message;
    message.ack?.();

    let payload: EventData;
    try {
      payload = decodePayload(message.payload);
    } catch (error) {
      logError(`[MQTT] Skipping malformed message on ${topic}: ${errorMessage(error)}`);
      return;
    }

    const matching = this.listeners.filter((listener) => topicMatches(listener.pattern, topic, this.transport.syntax));
    if (matching.length === 0) {
      logDebug(`[MQTT] ${this} recv topic=${topic}, msg=${message.payload.toString().slice(0, 30)}...`);
      return;
    }

    const scheduler = getScheduler(app);
    for (const listener of matching) {
      scheduler.create(() => this.handleCallback(listener, topic, payload), `listener:${listener.pattern}`);
    }
  }

  private async handleCallback({ callback }: Listener, topic: string, payload: EventData) {
    try {
      await callback(topic, payload);
    } catch (error) {
      logError(`[MQTT] ${new CallbackError(topic, error).message}`);
    }
  }
}
