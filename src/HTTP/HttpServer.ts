import express, { type Express } from 'express';
import type { Server } from 'http';
import { errorMessage } from '@utils/errors';
import { logError, logInfo } from '@utils/logger';
import type { Application } from '../Service/Application';
import type { Feature } from '../Service/Feature';
import { debugRoutes } from './debugRoutes';

export const createHttpApp = (app: Application): Express => {
  const server = express();
  server.use(express.json());
  server.use(debugRoutes(app));
  return server;
};

export class HttpServer implements Feature {
  readonly name = 'HttpServer';
  private server?: Server;

  async startup(app: Application) {
    const { http_host: host, http_port: port } = app.options;
    const server = createHttpApp(app).listen(port, host);

    await new Promise<void>((resolve, reject) => {
      server.once('listening', resolve);
      server.once('error', reject);
    });
    server.on('error', (error) => logError(`[HTTP] Server error: ${errorMessage(error)}`));

    this.server = server;
    logInfo(`[HTTP] Listening on ${host}:${port}`);
  }

  async shutdown(_app: Application) {
    const server = this.server;
    this.server = undefined;
    if (!server) return;

    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    logInfo('[HTTP] Closed');
  }
}

export const setupHttp = (app: Application) => {
  app.features.add(HttpServer, new HttpServer());
};
