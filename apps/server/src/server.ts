/**
 * HTTP server with the management API, and the wiring of targets to the
 * cluster and registries
 */

import { Server } from 'http';
import express, { NextFunction, Request, Response } from 'express';
import { KubernetesCluster } from './cluster/kubernetes';
import { ClusterPort } from './cluster/port';
import { ServerConfig } from './config';
import { errorMessage } from './errors';
import { createLogger } from './logger';
import { CredentialStore, RegistryProvider, createRegistryProvider } from './registry';
import { createTargetsRouter, sendError } from './routes/targets';
import { StrategyContext } from './strategies';
import { TargetController } from './targets/controller';
import { TargetRegistry } from './targets/registry';

const logger = createLogger('server');

export interface AppDeps {
  registry: TargetRegistry;
  strategyContext: StrategyContext;
}

function httpStatusOf(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return 500;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.use(express.json());

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/targets', createTargetsRouter(deps));

  // 404 for unknown routes
  app.use((_req: Request, res: Response) => {
    sendError(res, 404, 'Not found');
  });

  // Body parser failures carry their own 4xx status
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = httpStatusOf(error);
    if (status >= 500) {
      logger.error({ err: error }, 'Request error');
      sendError(res, 500, 'Internal server error', errorMessage(error));
      return;
    }
    sendError(res, status, 'Invalid request', errorMessage(error));
  });

  return app;
}

export interface ServerOverrides {
  cluster?: ClusterPort;
  registryFor?: RegistryProvider;
}

export interface PrewarmServer {
  app: express.Express;
  registry: TargetRegistry;
  start: () => Promise<void>;
  stop: () => Promise<void>;
}

export function createServer(config: ServerConfig, overrides: ServerOverrides = {}): PrewarmServer {
  const registryFor = overrides.registryFor
    ?? createRegistryProvider(CredentialStore.load(config.dockerConfigPath));
  const cluster = overrides.cluster ?? KubernetesCluster.fromDefaultConfig({
    namespace: config.namespace,
    pullSleepSeconds: config.pullJobSleepSeconds,
    owner: config.owner,
  });

  const registry = new TargetRegistry((definition) => new TargetController(definition, {
    cluster,
    intervalMs: config.checkIntervalSeconds * 1000,
    pullSecretName: config.dockerSecretName,
  }));
  const app = createApp({ registry, strategyContext: { registryFor } });
  let server: Server | null = null;

  const start = (): Promise<void> => new Promise((resolve, reject) => {
    const listening = app.listen(config.port, config.host, () => {
      logger.info('Prewarmer listening on %s:%d', config.host, config.port);
      resolve();
    });
    listening.once('error', reject);
    server = listening;
  });

  const stop = async (): Promise<void> => {
    await registry.close();
    const listening = server;
    server = null;
    if (listening) {
      await new Promise<void>((resolve, reject) => {
        listening.close((error) => (error ? reject(error) : resolve()));
      });
    }
    logger.info('Prewarmer stopped');
  };

  return { app, registry, start, stop };
}
