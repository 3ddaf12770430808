/**
 * Unit tests for server configuration
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadConfig } from './config';
import { ValidationError } from './errors';

describe('loadConfig', () => {
  const testRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'prewarm-config-'));
  const missingFile = path.join(testRoot, 'missing');

  afterAll(() => {
    fs.rmSync(testRoot, { recursive: true, force: true });
  });

  test('should apply defaults', () => {
    expect(loadConfig({}, missingFile)).toEqual({
      port: 8080,
      host: '0.0.0.0',
      checkIntervalSeconds: 60,
      dockerSecretName: '',
      namespace: 'default',
      pullJobSleepSeconds: 1200,
      dockerConfigPath: '/etc/secrets/.dockerconfigjson',
    });
  });

  test('should read values from the environment', () => {
    const config = loadConfig({
      PORT: '9000',
      HOST: '127.0.0.1',
      CHECK_INTERVAL_SECONDS: '15',
      DOCKER_SECRET_NAME: 'pull-secret',
      POD_NAMESPACE: 'prewarm',
      PULL_JOB_SLEEP_SECONDS: '600',
      DOCKER_CONFIG_PATH: '/tmp/docker.json',
      POD_NAME: 'prewarm-0',
      POD_UID: 'uid-1',
    }, missingFile);

    expect(config).toEqual({
      port: 9000,
      host: '127.0.0.1',
      checkIntervalSeconds: 15,
      dockerSecretName: 'pull-secret',
      namespace: 'prewarm',
      pullJobSleepSeconds: 600,
      dockerConfigPath: '/tmp/docker.json',
      owner: { name: 'prewarm-0', uid: 'uid-1' },
    });
  });

  test('should read the namespace from the service account file', () => {
    const namespaceFile = path.join(testRoot, 'namespace');
    fs.writeFileSync(namespaceFile, 'images\n');

    expect(loadConfig({}, namespaceFile).namespace).toBe('images');
  });

  test('should skip the owner unless both name and uid are set', () => {
    expect(loadConfig({ POD_NAME: 'prewarm-0' }, missingFile).owner).toBeUndefined();
  });

  test('should reject malformed numbers', () => {
    expect(() => loadConfig({ CHECK_INTERVAL_SECONDS: 'soon' }, missingFile)).toThrow(ValidationError);
    expect(() => loadConfig({ PORT: '80.5' }, missingFile)).toThrow('Invalid PORT');
  });

  test('should reject out of range numbers', () => {
    expect(() => loadConfig({ CHECK_INTERVAL_SECONDS: '0' }, missingFile)).toThrow('Invalid CHECK_INTERVAL_SECONDS');
    expect(() => loadConfig({ PORT: '70000' }, missingFile)).toThrow('Invalid PORT');
  });

  test('should require pull jobs to outlive the check interval', () => {
    expect(() => loadConfig({ CHECK_INTERVAL_SECONDS: '600', PULL_JOB_SLEEP_SECONDS: '600' }, missingFile))
      .toThrow('Invalid PULL_JOB_SLEEP_SECONDS');
    expect(() => loadConfig({ PULL_JOB_SLEEP_SECONDS: '30' }, missingFile)).toThrow(ValidationError);
    expect(loadConfig({ CHECK_INTERVAL_SECONDS: '600', PULL_JOB_SLEEP_SECONDS: '601' }, missingFile).pullJobSleepSeconds)
      .toBe(601);
  });
});
