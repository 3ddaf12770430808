/**
 * Registry client - Docker Registry HTTP API v2
 */

import axios, { AxiosInstance, AxiosResponse, Method } from 'axios';
import { z } from 'zod';
import { RegistryError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import { CredentialStore } from './credentials';

const logger = createLogger('registry-client');

const MANIFEST_ACCEPT = [
  'application/vnd.docker.distribution.manifest.list.v2+json',
  'application/vnd.docker.distribution.manifest.v2+json',
  'application/vnd.oci.image.index.v1+json',
  'application/vnd.oci.image.manifest.v1+json',
].join(', ');

const tagListSchema = z.object({
  name: z.string().optional(),
  tags: z.array(z.string()).nullable().optional(),
});

const tokenSchema = z
  .object({
    token: z.string().optional(),
    access_token: z.string().optional(),
  })
  .refine((body) => body.token !== undefined || body.access_token !== undefined, {
    message: 'token response carries no token',
  });

/**
 * Listing tags and resolving digests, the two registry operations the
 * strategies need.
 */
export interface RegistryPort {
  listTags(repository: string): Promise<string[]>;
  getDigest(repository: string, tag: string): Promise<string>;
}

export interface AuthChallenge {
  scheme: string;
  params: Record<string, string>;
}

/**
 * Parse a WWW-Authenticate header such as
 * `Bearer realm="https://auth.example.com/token",service="registry",scope="repository:lab:pull"`.
 */
export function parseChallenge(header: string): AuthChallenge | null {
  const match = /^\s*(\w+)\s*(.*)$/.exec(header);
  if (!match) {
    return null;
  }

  const params: Record<string, string> = {};
  for (const param of match[2].matchAll(/(\w+)="([^"]*)"/g)) {
    params[param[1].toLowerCase()] = param[2];
  }
  return { scheme: match[1].toLowerCase(), params };
}

function headerValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

/**
 * Next page from a `Link: </v2/lab/tags/list?last=x&n=100>; rel="next"` header.
 */
function nextPage(link: string | undefined): string | null {
  if (!link) return null;
  const match = /<([^>]+)>\s*;\s*rel="?next"?/.exec(link);
  return match ? match[1] : null;
}

export class RegistryClient implements RegistryPort {
  private readonly http: AxiosInstance;
  private readonly baseURL: string;
  // Authorization header per repository; bearer tokens are scoped to one
  private readonly authorizations = new Map<string, string>();

  constructor(
    readonly host: string,
    private readonly credentials: CredentialStore = new CredentialStore(),
    http?: AxiosInstance,
  ) {
    this.baseURL = `https://${host}`;
    this.http = http ?? axios.create({ timeout: 30000 });
  }

  async listTags(repository: string): Promise<string[]> {
    const tags: string[] = [];
    let path: string | null = `/v2/${repository}/tags/list`;

    while (path) {
      const response = await this.request('GET', repository, path);
      const parsed = tagListSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new RegistryError(`Unexpected tag list for ${repository} on ${this.host}`, response.status);
      }
      tags.push(...(parsed.data.tags ?? []));
      path = nextPage(headerValue(response.headers?.['link']));
    }

    logger.debug('Listed %d tags for %s/%s', tags.length, this.host, repository);
    return tags;
  }

  async getDigest(repository: string, tag: string): Promise<string> {
    const response = await this.request('HEAD', repository, `/v2/${repository}/manifests/${tag}`);
    const digest = headerValue(response.headers?.['docker-content-digest']);
    if (!digest) {
      throw new RegistryError(`No digest for ${this.host}/${repository}:${tag}`, response.status);
    }
    return digest;
  }

  private async request(
    method: Method,
    repository: string,
    path: string,
    retried = false,
  ): Promise<AxiosResponse<unknown>> {
    const url = path.startsWith('http') ? path : `${this.baseURL}${path}`;
    const headers: Record<string, string> = { Accept: MANIFEST_ACCEPT };
    const authorization = this.authorizations.get(repository);
    if (authorization) {
      headers.Authorization = authorization;
    }

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.request<unknown>({ method, url, headers, validateStatus: () => true });
    } catch (error) {
      throw new RegistryError(`${method} ${url} failed: ${errorMessage(error)}`, undefined, { cause: error });
    }

    if (response.status === 401 && !retried) {
      await this.authenticate(repository, headerValue(response.headers?.['www-authenticate']));
      return this.request(method, repository, path, true);
    }
    if (response.status >= 400) {
      throw new RegistryError(`${method} ${url} returned ${response.status}`, response.status);
    }
    return response;
  }

  /**
   * Answer a 401 challenge once, remembering the Authorization header for
   * later requests to the same repository.
   */
  private async authenticate(repository: string, header: string | undefined): Promise<void> {
    const challenge = header ? parseChallenge(header) : null;
    const credentials = this.credentials.get(this.host);

    if (challenge?.scheme === 'basic') {
      if (!credentials) {
        throw new RegistryError(`No credentials for ${this.host}`, 401);
      }
      const encoded = Buffer.from(`${credentials.username}:${credentials.password}`).toString('base64');
      this.authorizations.set(repository, `Basic ${encoded}`);
      return;
    }

    if (challenge?.scheme === 'bearer') {
      const { realm, ...params } = challenge.params;
      if (!realm) {
        throw new RegistryError(`Bearer challenge from ${this.host} has no realm`, 401);
      }

      let response: AxiosResponse<unknown>;
      try {
        response = await this.http.get<unknown>(realm, {
          params,
          auth: credentials,
          validateStatus: () => true,
        });
      } catch (error) {
        throw new RegistryError(`Token request to ${realm} failed: ${errorMessage(error)}`, undefined, { cause: error });
      }
      if (response.status >= 400) {
        throw new RegistryError(`Token request to ${realm} returned ${response.status}`, response.status);
      }

      const parsed = tokenSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new RegistryError(`No token in response from ${realm}`, response.status);
      }
      this.authorizations.set(repository, `Bearer ${parsed.data.token ?? parsed.data.access_token}`);
      logger.debug('Obtained bearer token for %s/%s', this.host, repository);
      return;
    }

    throw new RegistryError(`Unsupported authentication challenge from ${this.host}: ${header ?? 'none'}`, 401);
  }
}
