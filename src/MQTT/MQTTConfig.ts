import type { Protocol, ServiceOptions } from '@utils/options';

export const DEFAULT_PORTS: Record<Protocol, number> = {
  mqtt: 1883,
  mqtts: 8883,
  ws: 80,
  wss: 443,
};

export type MQTTConfig = {
  protocol: Protocol;
  host: string;
  port: number;
  /** Websocket path. Always empty for TCP protocols. */
  path: string;
  url: string;
  /** TLS and secure websockets. Certificates are not verified. */
  secure: boolean;
};

export const resolveMQTTConfig = (options: ServiceOptions): MQTTConfig => {
  const protocol = options.mqtt_protocol;
  const host = options.mqtt_host;
  const port = options.mqtt_port ?? DEFAULT_PORTS[protocol];
  const path = protocol === 'ws' || protocol === 'wss' ? options.mqtt_path : '';

  return {
    protocol,
    host,
    port,
    path,
    url: `${protocol}://${host}:${port}${path}`,
    secure: protocol === 'mqtts' || protocol === 'wss',
  };
};
