import { EventEmitter } from 'events';
import { connect, type MqttClient } from 'mqtt';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { CancelledError, ConnectionError, ProtocolError } from '@utils/errors';
import { parseOptions } from '@utils/options';
import type { ConnectionHandlers } from '../IBrokerTransport';
import { resolveMQTTConfig } from '../MQTTConfig';
import { MQTTConnection, subscriptionFilter } from '../MQTTConnection';
import { MQTTTransport } from '../MQTTTransport';

vi.mock('mqtt', () => ({ connect: vi.fn() }));

vi.mock('@utils/logger', () => ({
  logInfo: vi.fn(),
  logDebug: vi.fn(),
  logWarn: vi.fn(),
  logError: vi.fn(),
  setLogLevel: vi.fn(),
}));

class FakeMqttClient extends EventEmitter {
  connected = false;
  subscribeAsync = vi.fn(async (topic: string, options: { qos: number }) => [{ topic, qos: options.qos }]);
  unsubscribeAsync = vi.fn(async (_topic: string) => undefined);
  publishAsync = vi.fn(async (_topic: string, _payload: string, _options: object) => undefined);
  endAsync = vi.fn(async (_force: boolean) => {
    this.connected = false;
    this.emit('close');
  });
  end = vi.fn((_force: boolean) => this);
}

const asClient = (fake: FakeMqttClient) => fake as unknown as MqttClient;

const handlers = () => ({
  onMessage: vi.fn<ConnectionHandlers['onMessage']>(),
  onClose: vi.fn<ConnectionHandlers['onClose']>(),
});

describe('MQTTTransport', () => {
  let client: FakeMqttClient;

  beforeEach(() => {
    vi.clearAllMocks();
    client = new FakeMqttClient();
    vi.mocked(connect).mockReturnValue(asClient(client));
  });

  it('disables the client reconnect and resolves once connected', async () => {
    const transport = new MQTTTransport(resolveMQTTConfig(parseOptions({})));
    const pending = transport.connect({ handlers: handlers(), signal: new AbortController().signal });

    expect(connect).toHaveBeenCalledWith('mqtt://eventbus:1883', { reconnectPeriod: 0, connectTimeout: 30_000 });
    client.connected = true;
    client.emit('connect');

    const connection = await pending;
    expect(connection.closed).toBe(false);
    expect(transport.toString()).toBe('mqtt://eventbus:1883');
  });

  it('passes the will and skips certificate checks for secure protocols', async () => {
    const transport = new MQTTTransport(resolveMQTTConfig(parseOptions({ mqtt_protocol: 'wss' })), 1000);
    const will = { topic: 'events/status', payload: '{"online":false}', qos: 1 as const, retain: true };
    const pending = transport.connect({ handlers: handlers(), will, signal: new AbortController().signal });

    expect(connect).toHaveBeenCalledWith('wss://eventbus:443/eventbus', {
      reconnectPeriod: 0,
      connectTimeout: 1000,
      rejectUnauthorized: false,
      will,
    });
    client.connected = true;
    client.emit('connect');
    await pending;
  });

  it('fails with a ConnectionError when the broker is unreachable', async () => {
    const transport = new MQTTTransport(resolveMQTTConfig(parseOptions({})));
    const pending = transport.connect({ handlers: handlers(), signal: new AbortController().signal });

    client.emit('error', new Error('connect ECONNREFUSED'));

    await expect(pending).rejects.toThrow(
      new ConnectionError('Failed to connect to mqtt://eventbus:1883: connect ECONNREFUSED')
    );
    expect(client.end).toHaveBeenCalledWith(true);
  });

  it('fails with a ConnectionError when closed before connecting', async () => {
    const transport = new MQTTTransport(resolveMQTTConfig(parseOptions({})));
    const pending = transport.connect({ handlers: handlers(), signal: new AbortController().signal });

    client.emit('close');

    await expect(pending).rejects.toThrow('Connection to mqtt://eventbus:1883 closed before it was established');
  });

  it('gives up when cancelled', async () => {
    const transport = new MQTTTransport(resolveMQTTConfig(parseOptions({})));
    const controller = new AbortController();
    const pending = transport.connect({ handlers: handlers(), signal: controller.signal });

    controller.abort(new CancelledError('stopping'));

    await expect(pending).rejects.toThrow(CancelledError);
    expect(client.end).toHaveBeenCalledWith(true);
  });
});

describe('MQTTConnection', () => {
  let client: FakeMqttClient;

  beforeEach(() => {
    vi.clearAllMocks();
    client = new FakeMqttClient();
    client.connected = true;
  });

  it('maps subscriptions onto topic filters', () => {
    expect(subscriptionFilter({ exchange: 'events', routing: 'state/#', kind: 'topic', qos: 0 })).toBe('events/state/#');
    expect(subscriptionFilter({ exchange: 'events', routing: 'ignored', kind: 'fanout', qos: 0 })).toBe('events/#');
    expect(subscriptionFilter({ exchange: '', routing: 'state/a', kind: 'direct', qos: 0 })).toBe('state/a');
  });

  it('subscribes and unsubscribes the filter', async () => {
    const connection = new MQTTConnection(asClient(client), handlers());
    const subscription = { exchange: 'events', routing: 'state/+', kind: 'topic' as const, qos: 1 as const };

    await connection.declare(subscription);
    await connection.undeclare(subscription);

    expect(client.subscribeAsync).toHaveBeenCalledWith('events/state/+', { qos: 1 });
    expect(client.unsubscribeAsync).toHaveBeenCalledWith('events/state/+');
  });

  it('raises a ProtocolError when the broker refuses a subscription', async () => {
    client.subscribeAsync.mockResolvedValueOnce([{ topic: 'events/#', qos: 128 }]);
    const connection = new MQTTConnection(asClient(client), handlers());

    await expect(connection.declare({ exchange: 'events', routing: '#', kind: 'topic', qos: 0 })).rejects.toThrow(
      new ProtocolError('Broker refused subscription to events/#')
    );
  });

  it('publishes with the requested delivery options', async () => {
    const connection = new MQTTConnection(asClient(client), handlers());

    await connection.publish('events/x', '{"a":1}', { qos: 2, retain: true });

    expect(client.publishAsync).toHaveBeenCalledWith('events/x', '{"a":1}', { qos: 2, retain: true });
  });

  it('classifies failures by connection state', async () => {
    const connection = new MQTTConnection(asClient(client), handlers());

    client.publishAsync.mockRejectedValueOnce(new Error('not authorized'));
    await expect(connection.publish('events/x', '', { qos: 0, retain: false })).rejects.toThrow(
      new ProtocolError('publish(events/x) failed: not authorized')
    );

    client.connected = false;
    client.publishAsync.mockRejectedValueOnce(new Error('client disconnecting'));
    await expect(connection.publish('events/x', '', { qos: 0, retain: false })).rejects.toThrow(
      new ConnectionError('publish(events/x) failed: client disconnecting')
    );
  });

  it('forwards inbound messages', () => {
    const events = handlers();
    new MQTTConnection(asClient(client), events);

    client.emit('message', 'events/x', Buffer.from('1'));

    expect(events.onMessage).toHaveBeenCalledWith({ topic: 'events/x', payload: Buffer.from('1') });
  });

  it('reports a close by the broker', () => {
    const events = handlers();
    const connection = new MQTTConnection(asClient(client), events);

    client.connected = false;
    client.emit('close');

    expect(connection.closed).toBe(true);
    expect(events.onClose).toHaveBeenCalledWith(new ConnectionError('Connection closed by broker'));
  });

  it('does not report its own close', async () => {
    const events = handlers();
    const connection = new MQTTConnection(asClient(client), events);

    await connection.close();
    await connection.close();

    expect(client.endAsync).toHaveBeenCalledTimes(1);
    expect(client.endAsync).toHaveBeenCalledWith(true);
    expect(events.onClose).not.toHaveBeenCalled();
    expect(connection.closed).toBe(true);
  });
});
