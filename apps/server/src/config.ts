/**
 * Server configuration from environment variables
 */

import * as fs from 'fs';
import { ValidationError, errorMessage } from './errors';
import { PodOwner } from './cluster/kubernetes';
import { createLogger } from './logger';

const logger = createLogger('config');

export const SERVICE_ACCOUNT_NAMESPACE_FILE = '/var/run/secrets/kubernetes.io/serviceaccount/namespace';

export interface ServerConfig {
  port: number;
  host: string;
  checkIntervalSeconds: number;
  /** Secret attached to pull jobs; empty means none */
  dockerSecretName: string;
  namespace: string;
  pullJobSleepSeconds: number;
  dockerConfigPath: string;
  owner?: PodOwner;
}

export type Env = Record<string, string | undefined>;

function readInteger(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new ValidationError(`Invalid ${key}`, `expected a whole number, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < min) {
    throw new ValidationError(`Invalid ${key}`, `must be at least ${min}`);
  }
  return value;
}

function readNamespace(env: Env, namespaceFile: string): string {
  if (env.POD_NAMESPACE) {
    return env.POD_NAMESPACE;
  }
  try {
    if (fs.existsSync(namespaceFile)) {
      const namespace = fs.readFileSync(namespaceFile, 'utf8').trim();
      if (namespace) {
        return namespace;
      }
    }
  } catch (error) {
    logger.warn('Cannot read %s: %s', namespaceFile, errorMessage(error));
  }
  return 'default';
}

/**
 * Load configuration, applying defaults for anything unset.
 */
export function loadConfig(env: Env = process.env, namespaceFile = SERVICE_ACCOUNT_NAMESPACE_FILE): ServerConfig {
  const config: ServerConfig = {
    port: readInteger(env, 'PORT', 8080, 0),
    host: env.HOST || '0.0.0.0',
    checkIntervalSeconds: readInteger(env, 'CHECK_INTERVAL_SECONDS', 60, 1),
    dockerSecretName: env.DOCKER_SECRET_NAME || '',
    namespace: readNamespace(env, namespaceFile),
    pullJobSleepSeconds: readInteger(env, 'PULL_JOB_SLEEP_SECONDS', 1200, 1),
    dockerConfigPath: env.DOCKER_CONFIG_PATH || '/etc/secrets/.dockerconfigjson',
  };

  if (config.port > 65535) {
    throw new ValidationError('Invalid PORT', 'must be at most 65535');
  }
  // A pull job's container must outlive the check that deletes it
  if (config.pullJobSleepSeconds <= config.checkIntervalSeconds) {
    throw new ValidationError(
      'Invalid PULL_JOB_SLEEP_SECONDS',
      `must be longer than CHECK_INTERVAL_SECONDS (${config.checkIntervalSeconds})`,
    );
  }
  if (env.POD_NAME && env.POD_UID) {
    config.owner = { name: env.POD_NAME, uid: env.POD_UID };
  }
  return config;
}
