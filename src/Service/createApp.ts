import type { IBrokerTransport } from '@mqtt/IBrokerTransport';
import { setupMQTT } from '@mqtt/mqtt';
import type { ServiceOptions } from '@utils/options';
import { setupHttp } from '../HTTP/HttpServer';
import { setupScheduler } from '../Scheduler/TaskScheduler';
import { Application } from './Application';

export type CreateAppOverrides = {
  /** Replaces the MQTT transport built from the options. */
  transport?: IBrokerTransport;
  /** Leaves out the HTTP server. */
  http?: boolean;
};

/** Builds an application with the scheduler, the broker connection and the HTTP server registered. */
export const createApp = (options: ServiceOptions, { transport, http = true }: CreateAppOverrides = {}) => {
  const app = new Application(options);
  setupScheduler(app);
  setupMQTT(app, transport);
  if (http) setupHttp(app);
  return app;
};
