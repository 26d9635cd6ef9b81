import type { Server } from 'node:http';
import cors from 'cors';
import express, { type Express } from 'express';
import type { BaseNode } from '../../simulation/nodes/BaseNode.js';
import { createLogger } from '../../simulation/utils/log.js';
import { errorHandler, notFoundHandler } from '../middleware/errorHandler.js';
import { requestLogger } from '../middleware/requestLogger.js';
import { createControlRouter } from '../routes/control.js';
import { createHealthRouter } from '../routes/health.js';
import { createMetricsRouter } from '../routes/metrics.js';

const log = createLogger('admin');

export interface AdminOptions {
  node: BaseNode;
  corsOrigin: string;
}

export function createAdminApp(options: AdminOptions): Express {
  const app = express();
  const deps = { node: options.node };
  app.use(cors({ origin: options.corsOrigin }));
  app.use(express.json({ limit: '64kb' }));
  app.use(requestLogger);

  app.use('/health', createHealthRouter(deps));
  app.use('/metrics', createMetricsRouter(deps));
  app.use('/control', createControlRouter(deps));

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}

export function startAdminServer(app: Express, port: number, host: string): Promise<Server> {
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('error', reject);
    server.once('listening', () => {
      server.off('error', reject);
      const address = server.address();
      const bound = address !== null && typeof address === 'object' ? address.port : port;
      log.info(`admin listening on http://${host}:${bound}`);
      resolve(server);
    });
  });
}

export function closeAdminServer(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
}
