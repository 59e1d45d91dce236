import { ConnectionError, errorMessage } from '@utils/errors';
import { logDebug, logInfo } from '@utils/logger';
import { connect, type IClientOptions } from 'mqtt';
import type { ConnectOptions, IBrokerConnection, IBrokerTransport } from './IBrokerTransport';
import type { MQTTConfig } from './MQTTConfig';
import { MQTTConnection } from './MQTTConnection';
import { MQTT_SYNTAX } from './topics';

export const CONNECT_TIMEOUT_MS = 30_000;

export class MQTTTransport implements IBrokerTransport {
  readonly syntax = MQTT_SYNTAX;

  constructor(private readonly config: MQTTConfig, private readonly connectTimeoutMs = CONNECT_TIMEOUT_MS) {}

  toString() {
    return this.config.url;
  }

  /**
   * Opens one MQTT session. The client's own reconnect is disabled:
   * the connection manager owns the reconnect policy and redeclares subscriptions itself.
   */
  connect({ handlers, will, signal }: ConnectOptions): Promise<IBrokerConnection> {
    const { url, secure } = this.config;
    logInfo(`[MQTT] Connecting to ${url}...`);

    return new Promise((resolve, reject) => {
      if (signal.aborted) return reject(signal.reason);

      const options: IClientOptions = {
        reconnectPeriod: 0,
        connectTimeout: this.connectTimeoutMs,
        ...(secure ? { rejectUnauthorized: false } : {}),
        ...(will ? { will } : {}),
      };
      const client = connect(url, options);

      const cleanup = () => {
        client.off('connect', onConnect);
        client.off('error', onError);
        client.off('close', onClose);
        signal.removeEventListener('abort', onAbort);
      };
      const fail = (error: unknown) => {
        cleanup();
        client.on('error', (late) => logDebug(`[MQTT] Error after failed connect: ${errorMessage(late)}`));
        client.end(true);
        reject(error);
      };
      const onConnect = () => {
        cleanup();
        resolve(new MQTTConnection(client, handlers));
      };
      const onError = (error: Error) => fail(new ConnectionError(`Failed to connect to ${url}: ${error.message}`));
      const onClose = () => fail(new ConnectionError(`Connection to ${url} closed before it was established`));
      const onAbort = () => fail(signal.reason);

      client.once('connect', onConnect);
      client.on('error', onError);
      client.on('close', onClose);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}
