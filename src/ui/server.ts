import 'dotenv/config';
import express from 'express';
import path from 'path';
import crypto from 'crypto';
import { AdvisorConfig } from '../core/types';
import { loadConfig } from '../core/utils';
import { RouteDeps, registerRoutes } from './routes';

export interface DashboardOptions extends RouteDeps {
  csrfToken?: string;
}

/** Dashboard app with static assets and routes; does not listen. */
export const createApp = (config: AdvisorConfig, opts: DashboardOptions = {}) => {
  const app = express();
  const csrfToken = opts.csrfToken ?? crypto.randomUUID();
  app.use('/public', express.static(path.resolve(__dirname, 'public')));
  registerRoutes(app, csrfToken, { ...opts, config });
  return { app, csrfToken };
};

export const startServer = (app: express.Application, port: number, bind: string, allowFallback = true) => {
  const server = app.listen(port, bind, () => {
    const address = server.address();
    const boundPort = address && typeof address === 'object' ? address.port : port;
    console.log(`VR dashboard running at http://${bind}:${boundPort}`);
  });
  server.on('error', (err: NodeJS.ErrnoException) => {
    if (allowFallback && (err.code === 'EACCES' || err.code === 'EPERM' || err.code === 'EADDRINUSE')) {
      console.warn(`UI port ${port} blocked (${err.code}); retrying on an ephemeral port.`);
      startServer(app, 0, bind, false);
      return;
    }
    console.error('UI failed to start', err);
    process.exit(1);
  });
  return server;
};

if (require.main === module) {
  const config = loadConfig();
  const { app } = createApp(config);
  startServer(app, Number(process.env.UI_PORT || config.uiPort || 8787), process.env.UI_BIND || config.uiBind || '127.0.0.1');
}
