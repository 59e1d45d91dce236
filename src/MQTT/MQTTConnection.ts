import { ConnectionError, errorMessage, ProtocolError } from '@utils/errors';
import { logDebug, logError, logWarn } from '@utils/logger';
import type { MqttClient } from 'mqtt';
import type { ConnectionHandlers, IBrokerConnection, PublishOptions, Subscription } from './IBrokerTransport';
import { joinTopic, MQTT_SYNTAX } from './topics';

/**
 * MQTT has no exchanges: the exchange is the topic root.
 * A fanout binding receives everything below the root, topic and direct bindings the routing filter.
 */
export const subscriptionFilter = (subscription: Subscription): string => {
  const routing = subscription.kind === 'fanout' ? MQTT_SYNTAX.multi : subscription.routing;
  return joinTopic(subscription.exchange, routing, MQTT_SYNTAX);
};

export class MQTTConnection implements IBrokerConnection {
  private ended = false;

  constructor(private client: MqttClient, handlers: ConnectionHandlers) {
    client.on('message', (topic, payload) => {
      handlers.onMessage({ topic, payload });
    });

    client.on('error', (error) => {
      logError(`[MQTT] Error: ${errorMessage(error)}`);
    });

    client.once('close', () => {
      if (this.ended) return;
      logWarn('[MQTT] Connection closed');
      handlers.onClose(new ConnectionError('Connection closed by broker'));
    });
  }

  get closed() {
    return this.ended || !this.client.connected;
  }

  async declare(subscription: Subscription) {
    const filter = subscriptionFilter(subscription);
    const grants = await this.client
      .subscribeAsync(filter, { qos: subscription.qos })
      .catch((error: unknown) => Promise.reject(this.classify(error, `subscribe(${filter})`)));

    if (grants.some((grant) => grant.qos > 2)) {
      throw new ProtocolError(`Broker refused subscription to ${filter}`);
    }
  }

  async undeclare(subscription: Subscription) {
    const filter = subscriptionFilter(subscription);
    await this.client
      .unsubscribeAsync(filter)
      .catch((error: unknown) => Promise.reject(this.classify(error, `unsubscribe(${filter})`)));
  }

  async publish(topic: string, payload: string, options: PublishOptions) {
    await this.client
      .publishAsync(topic, payload, { qos: options.qos, retain: options.retain })
      .catch((error: unknown) => Promise.reject(this.classify(error, `publish(${topic})`)));
  }

  /**
   * Force-close immediately (don't wait for inflight acks).
   * The broker-side last will is the authoritative signal for unclean exits.
   */
  async close() {
    if (this.ended) return;
    this.ended = true;
    try {
      await this.client.endAsync(true);
    } catch (error) {
      logDebug(`[MQTT] Error while closing: ${errorMessage(error)}`);
    }
  }

  private classify(error: unknown, what: string): Error {
    const message = `${what} failed: ${error instanceof Error ? error.message : String(error)}`;
    return this.closed ? new ConnectionError(message) : new ProtocolError(message);
  }
}
