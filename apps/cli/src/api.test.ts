/**
 * API Client Tests
 */

import axios from 'axios';
import MockAdapter from 'axios-mock-adapter';
import { APIClient } from './api';
import { TargetSnapshot } from './types';

const snapshot: TargetSnapshot = {
  name: 'lab',
  labels: { pool: 'lab' },
  commonCache: [],
  available: [],
  desired: [],
  missing: [],
  all: [],
  pulling: null,
  lastCheckedAt: null,
  lastError: null,
};

describe('APIClient', () => {
  let mock: MockAdapter;
  let client: APIClient;

  beforeEach(() => {
    const http = axios.create();
    mock = new MockAdapter(http);
    client = new APIClient('http://localhost:8080', http);
  });

  describe('listTargets', () => {
    it('should list target names', async () => {
      mock.onGet('/targets').reply(200, ['lab', 'batch']);

      await expect(client.listTargets()).resolves.toEqual(['lab', 'batch']);
    });
  });

  describe('getTarget', () => {
    it('should get a target snapshot', async () => {
      mock.onGet('/targets/lab').reply(200, snapshot);

      await expect(client.getTarget('lab')).resolves.toEqual(snapshot);
    });
  });

  describe('getAvailable and getDesired', () => {
    it('should get the image lists', async () => {
      const image = { imageURL: 'registry.example.com/lab:a', digest: null, displayName: 'Lab' };
      mock.onGet('/targets/lab/available').reply(200, { images: [], all: [image] });
      mock.onGet('/targets/lab/desired').reply(200, { images: [image], all: [image] });

      await expect(client.getAvailable('lab')).resolves.toEqual({ images: [], all: [image] });
      await expect(client.getDesired('lab')).resolves.toEqual({ images: [image], all: [image] });
    });
  });

  describe('createTarget', () => {
    it('should post the definition as is', async () => {
      const definition = { name: 'lab', strategies: [{ type: 'static', images: [] }] };
      mock.onPost('/targets', definition).reply(200, snapshot);

      await expect(client.createTarget(definition)).resolves.toEqual(snapshot);
    });
  });

  describe('deleteTarget', () => {
    it('should delete a target', async () => {
      mock.onDelete('/targets/lab').reply(200, { success: true });

      await expect(client.deleteTarget('lab')).resolves.toBeUndefined();
      expect(mock.history.delete.length).toBe(1);
    });
  });

  describe('handleError', () => {
    it('should use the error body from the server', async () => {
      mock.onPost('/targets').reply(400, { code: 400, message: 'Invalid target', details: 'name: Required' });

      const error = await client.createTarget({}).catch((e: unknown) => e);

      expect(APIClient.handleError(error)).toEqual({
        code: 400,
        message: 'Invalid target',
        details: 'name: Required',
      });
    });

    it('should fall back to the HTTP status without an error body', async () => {
      mock.onGet('/targets').reply(502, 'Bad Gateway');

      const error = await client.listTargets().catch((e: unknown) => e);

      expect(APIClient.handleError(error)).toEqual({
        code: 502,
        message: 'Request failed with status code 502',
      });
    });

    it('should handle network errors', async () => {
      mock.onGet('/targets').networkError();

      const error = await client.listTargets().catch((e: unknown) => e);

      expect(APIClient.handleError(error)).toEqual({ code: 500, message: 'Network Error' });
    });

    it('should handle non-axios errors', () => {
      expect(APIClient.handleError(new Error('boom'))).toEqual({ code: 500, message: 'boom' });
      expect(APIClient.handleError('unknown')).toEqual({ code: 500, message: 'Unknown error' });
    });
  });
});
