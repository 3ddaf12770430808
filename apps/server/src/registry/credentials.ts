/**
 * Registry credentials from a docker config file
 */

import * as fs from 'fs';
import { z } from 'zod';
import { errorMessage } from '../errors';
import { createLogger } from '../logger';

const logger = createLogger('registry-credentials');

const dockerConfigSchema = z.object({
  auths: z.record(
    z.object({
      auth: z.string().optional(),
      username: z.string().optional(),
      password: z.string().optional(),
    }),
  ).default({}),
});

export type DockerConfig = z.infer<typeof dockerConfigSchema>;

export interface RegistryCredentials {
  username: string;
  password: string;
}

// Keys are either bare hosts or URLs such as https://index.docker.io/v1/
function hostOf(key: string): string {
  return key.replace(/^[a-z]+:\/\//, '').replace(/\/.*$/, '');
}

export class CredentialStore {
  private readonly byHost = new Map<string, RegistryCredentials>();

  constructor(config: DockerConfig = { auths: {} }) {
    for (const [key, entry] of Object.entries(config.auths)) {
      let credentials: RegistryCredentials | undefined;
      if (entry.auth) {
        const decoded = Buffer.from(entry.auth, 'base64').toString('utf8');
        const colon = decoded.indexOf(':');
        if (colon !== -1) {
          credentials = { username: decoded.slice(0, colon), password: decoded.slice(colon + 1) };
        }
      } else if (entry.username !== undefined && entry.password !== undefined) {
        credentials = { username: entry.username, password: entry.password };
      }

      if (credentials) {
        this.byHost.set(hostOf(key), credentials);
      } else {
        logger.warn('No usable credentials for %s', key);
      }
    }
  }

  /**
   * Load credentials from a docker config JSON file. A missing or
   * unreadable file yields an empty store.
   */
  static load(filePath: string): CredentialStore {
    if (!fs.existsSync(filePath)) {
      logger.info('No registry credentials at %s', filePath);
      return new CredentialStore();
    }

    try {
      const content = JSON.parse(fs.readFileSync(filePath, 'utf8'));
      return new CredentialStore(dockerConfigSchema.parse(content));
    } catch (error) {
      logger.warn('Ignoring registry credentials at %s: %s', filePath, errorMessage(error));
      return new CredentialStore();
    }
  }

  get(host: string): RegistryCredentials | undefined {
    return this.byHost.get(host);
  }

  get size(): number {
    return this.byHost.size;
  }
}
