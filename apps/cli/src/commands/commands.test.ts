/**
 * Command Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import axios from 'axios';
import MockAdapter from 'axios-mock-adapter';
import { APIClient } from '../api';
import { Formatter } from '../formatter';
import { CommandContext } from './context';
import { createTargetCmd, readTargetFile } from './create';
import { deleteTargetCmd } from './delete';
import { desiredImagesCmd } from './images';
import { listTargetsCmd } from './list';

describe('commands', () => {
  const testRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'prewarm-cli-'));
  let mock: MockAdapter;
  let context: CommandContext;
  let log: jest.SpyInstance;
  let errorLog: jest.SpyInstance;

  beforeEach(() => {
    const http = axios.create();
    mock = new MockAdapter(http);
    context = { api: new APIClient('http://localhost:8080', http), formatter: new Formatter('simple') };
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorLog = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  afterAll(() => {
    fs.rmSync(testRoot, { recursive: true, force: true });
  });

  it('should print target names', async () => {
    mock.onGet('/targets').reply(200, ['lab', 'batch']);

    await listTargetsCmd(context);

    expect(log).toHaveBeenCalledWith('lab\nbatch');
  });

  it('should print desired images', async () => {
    mock.onGet('/targets/lab/desired').reply(200, {
      images: [{ imageURL: 'r/lab:a', digest: null, displayName: 'r/lab:a' }],
      all: [],
    });

    await desiredImagesCmd('lab', context);

    expect(log).toHaveBeenCalledWith('r/lab:a\t-');
  });

  it('should confirm deletion', async () => {
    mock.onDelete('/targets/lab').reply(200, { success: true });

    await deleteTargetCmd('lab', context);

    expect(log).toHaveBeenCalledWith('Target lab deleted');
  });

  it('should print the server error and exit 1', async () => {
    mock.onGet('/targets').reply(500, { code: 500, message: 'Internal server error' });

    await expect(listTargetsCmd(context)).rejects.toThrow('exit 1');
    expect(errorLog).toHaveBeenCalledWith('Error: Internal server error');
  });

  describe('create', () => {
    it('should post the file contents', async () => {
      const file = path.join(testRoot, 'lab.json');
      const definition = { name: 'lab', strategies: [{ type: 'static', images: [] }] };
      fs.writeFileSync(file, JSON.stringify(definition));
      mock.onPost('/targets', definition).reply(200, {
        name: 'lab',
        labels: {},
        commonCache: [],
        available: [],
        desired: [],
        missing: [],
        all: [],
        pulling: null,
        lastCheckedAt: null,
        lastError: null,
      });

      await createTargetCmd(file, context);

      expect(log).toHaveBeenCalledWith('lab\t0/0\t-');
    });

    it('should report a missing file', async () => {
      const file = path.join(testRoot, 'missing.json');

      await expect(createTargetCmd(file, context)).rejects.toThrow('exit 1');
      expect(errorLog.mock.calls[0][0]).toMatch(/^Error: Cannot read .*missing\.json: /);
      expect(mock.history.post.length).toBe(0);
    });

    it('should reject invalid JSON', () => {
      const file = path.join(testRoot, 'broken.json');
      fs.writeFileSync(file, '{"name":');

      expect(() => readTargetFile(file)).toThrow(`Invalid JSON in ${file}`);
    });
  });
});
