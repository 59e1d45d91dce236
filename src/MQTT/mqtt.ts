/**
 * Publishing and subscribing to broker events from anywhere in the application.
 *
 * @example
 * setupScheduler(app);
 * setupMQTT(app);
 *
 * listen(app, 'events/state/+', async (topic, body) => logInfo(`${topic}: ${JSON.stringify(body)}`));
 * subscribe(app, 'events', 'state/#');
 *
 * await publish(app, 'events/state/a', { example: true });
 */
import type { Application } from '../Service/Application';
import type { QoS } from '@utils/options';
import type { EventData } from '@utils/options.schema';
import { ConnectionManager, type ListenerCallback, type PublishCallOptions } from './ConnectionManager';
import type { ExchangeKind, IBrokerTransport, Subscription } from './IBrokerTransport';
import { resolveMQTTConfig } from './MQTTConfig';
import { MQTTTransport } from './MQTTTransport';

/**
 * Registers the ConnectionManager with the application. Must be called before the application starts.
 * The scheduler must be set up first.
 */
export const setupMQTT = (
  app: Application,
  transport: IBrokerTransport = new MQTTTransport(resolveMQTTConfig(app.options))
): ConnectionManager => {
  const { options } = app;
  const manager = new ConnectionManager(transport, {
    reconnectIntervalMs: options.reconnect_interval_ms,
    pendingWaitMs: options.pending_wait_ms,
    interactionTimeoutMs: options.interaction_timeout_ms,
  });

  if (options.mqtt_will) {
    const { topic, message, qos, retain } = options.mqtt_will;
    manager.setClientWill(topic, message, { qos, retain });
  }

  app.features.add(ConnectionManager, manager);
  return manager;
};

export const getConnectionManager = (app: Application): ConnectionManager => app.features.get(ConnectionManager);

/** Sets the MQTT Last Will and Testament. Must be called before the application starts. */
export const setClientWill = (
  app: Application,
  topic: string,
  message?: EventData,
  options?: { qos?: QoS; retain?: boolean }
) => getConnectionManager(app).setClientWill(topic, message, options);

export const publish = (app: Application, topic: string, message: EventData | undefined, options?: PublishCallOptions) =>
  getConnectionManager(app).publish(topic, message, options);

/**
 * Subscribes to messages routed to `exchange` matching `routing`.
 * Callbacks additionally need `listen()`; one subscription can feed many listeners.
 */
export const subscribe = (app: Application, exchange: string, routing: string, kind?: ExchangeKind, qos?: QoS): Subscription =>
  getConnectionManager(app).subscribe(exchange, routing, kind, qos);

export const unsubscribe = (app: Application, exchange: string, routing: string) =>
  getConnectionManager(app).unsubscribe(exchange, routing);

/** Calls `callback` for every received message whose topic matches `pattern`. Requires a matching subscribe(). */
export const listen = (app: Application, pattern: string, callback: ListenerCallback) =>
  getConnectionManager(app).listen(pattern, callback);

export const unlisten = (app: Application, pattern: string, callback: ListenerCallback) =>
  getConnectionManager(app).unlisten(pattern, callback);
