/**
 * Registry clients, one per registry host
 */

import { RegistryClient, RegistryPort } from './client';
import { CredentialStore } from './credentials';

export type RegistryProvider = (host: string) => RegistryPort;

export function createRegistryProvider(credentials: CredentialStore): RegistryProvider {
  const clients = new Map<string, RegistryClient>();
  return (host: string) => {
    let client = clients.get(host);
    if (!client) {
      client = new RegistryClient(host, credentials);
      clients.set(host, client);
    }
    return client;
  };
}

export { RegistryClient, parseChallenge } from './client';
export type { RegistryPort, AuthChallenge } from './client';
export { CredentialStore } from './credentials';
export type { RegistryCredentials } from './credentials';
