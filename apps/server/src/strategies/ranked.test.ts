/**
 * Unit tests for the ranked strategy
 */

import { RegistryError } from '../errors';
import { MemoryRegistry } from '../testing/memory-registry';
import { CachedImage } from '../types';
import { RankedStrategy, RankedStrategyConfig } from './ranked';

const REPO = 'project/lab';
const BASE = `registry.hub.docker.com/${REPO}`;

function strategy(registry: MemoryRegistry, config: Partial<RankedStrategyConfig> = {}): RankedStrategy {
  return new RankedStrategy({
    repo: REPO,
    num_releases: 1,
    num_weeklies: 1,
    num_dailies: 1,
    ...config,
  }, { registryFor: registry.provider() });
}

describe('RankedStrategy', () => {
  test('should put the recommended image first, named after its release', async () => {
    const registry = new MemoryRegistry().push(REPO, {
      recommended: 'sha256:r21',
      r21_0_0: 'sha256:r21',
      w_2021_03: 'sha256:w3',
      d_2021_01_13: 'sha256:d13',
    });

    const result = await strategy(registry, { recommended_tag: 'recommended' }).desiredImages([]);

    expect(result.priority).toEqual([
      { imageURL: `${BASE}:recommended`, digest: 'sha256:r21', displayName: 'Recommended (Release r21.0.0)' },
      { imageURL: `${BASE}:r21_0_0`, digest: 'sha256:r21', displayName: 'Release r21.0.0' },
      { imageURL: `${BASE}:w_2021_03`, digest: 'sha256:w3', displayName: 'Weekly 2021_03' },
      { imageURL: `${BASE}:d_2021_01_13`, digest: 'sha256:d13', displayName: 'Daily 2021_01_13' },
    ]);
    expect(result.all).toEqual([
      { imageURL: `${BASE}:w_2021_03`, digest: null, displayName: 'w_2021_03' },
      { imageURL: `${BASE}:recommended`, digest: null, displayName: 'recommended' },
      { imageURL: `${BASE}:r21_0_0`, digest: null, displayName: 'r21_0_0' },
      { imageURL: `${BASE}:d_2021_01_13`, digest: null, displayName: 'd_2021_01_13' },
    ]);
  });

  test('should pick the newest images of each kind', async () => {
    const registry = new MemoryRegistry().push(REPO, {
      r20_0_0: 'sha256:r20',
      r21_0_0: 'sha256:r21',
      r21_0_1: 'sha256:r211',
      r22_0_0_rc1: 'sha256:rc1',
      w_2021_9: 'sha256:w9',
      w_2021_10: 'sha256:w10',
      d_2021_01_13: 'sha256:d13',
      exp_random: 'sha256:exp',
    });

    const result = await strategy(registry, { num_releases: 2, num_dailies: 0 }).desiredImages([]);

    expect(result.priority.map((image) => image.displayName)).toEqual([
      'Release r21.0.1',
      'Release r21.0.0',
      'Weekly 2021_10',
    ]);
    expect(result.all.length).toBe(8);
  });

  test('should resolve digests only for picked and alias tags', async () => {
    const registry = new MemoryRegistry().push(REPO, {
      r20_0_0: 'sha256:r20',
      r21_0_0: 'sha256:r21',
      recommended: 'sha256:r21',
    });

    await strategy(registry, { recommended_tag: 'recommended' }).desiredImages([]);

    expect(registry.digestLookups).toEqual(['r21_0_0', 'recommended']);
  });

  test('should skip configured aliases the registry does not have', async () => {
    const registry = new MemoryRegistry().push(REPO, { r21_0_0: 'sha256:r21' });

    const result = await strategy(registry, { alias_tags: ['latest'] }).desiredImages([]);

    expect(result.priority.map((image) => image.imageURL)).toEqual([`${BASE}:r21_0_0`]);
  });

  test('should order aliases after the recommended tag', async () => {
    const registry = new MemoryRegistry().push(REPO, {
      latest_weekly: 'sha256:w3',
      recommended: 'sha256:r21',
      r21_0_0: 'sha256:r21',
      w_2021_03: 'sha256:w3',
    });

    const result = await strategy(registry, {
      recommended_tag: 'recommended',
      alias_tags: ['latest_weekly', 'recommended'],
      num_dailies: 0,
    }).desiredImages([]);

    expect(result.priority.map((image) => image.displayName)).toEqual([
      'Recommended (Release r21.0.0)',
      'Latest Weekly (Weekly 2021_03)',
      'Release r21.0.0',
      'Weekly 2021_03',
    ]);
  });

  test('should name an alias after a resident image it is not picking', async () => {
    const registry = new MemoryRegistry().push(REPO, {
      recommended: 'sha256:r20',
      r21_0_0: 'sha256:r21',
    });
    const cache: CachedImage[] = [
      { imageURL: `${BASE}:r20_0_0`, digest: 'sha256:r20', tags: ['recommended'] },
    ];

    const result = await strategy(registry, { recommended_tag: 'recommended' }).desiredImages(cache);

    expect(result.priority[0].displayName).toBe('Recommended (Release r20.0.0)');
  });

  test('should keep an alias without a known target under its own name', async () => {
    const registry = new MemoryRegistry().push(REPO, { recommended: 'sha256:other' });

    const result = await strategy(registry, { recommended_tag: 'recommended' }).desiredImages([]);

    expect(result.priority).toEqual([
      { imageURL: `${BASE}:recommended`, digest: 'sha256:other', displayName: 'Recommended' },
    ]);
  });

  describe('with a cycle', () => {
    const registry = new MemoryRegistry().push(REPO, {
      'r21_0_0_c0020.001': 'sha256:c20',
      'r21_0_1_c0021.001': 'sha256:c21',
      'w_2021_03_c0020.001': 'sha256:w20',
      recommended: 'sha256:c21',
      latest_weekly: 'sha256:w20',
    });

    test('should offer only images of that cycle', async () => {
      const result = await strategy(registry, {
        cycle: 20,
        recommended_tag: 'recommended',
        alias_tags: ['latest_weekly'],
      }).desiredImages([]);

      expect(result.priority.map((image) => image.displayName)).toEqual([
        'Latest Weekly (Weekly 2021_03_c0020.001)',
        'Release r21.0.0_c0020.001',
        'Weekly 2021_03_c0020.001',
      ]);
    });

    test('should keep the recommended image when it is of that cycle', async () => {
      const result = await strategy(registry, { cycle: 21, recommended_tag: 'recommended' }).desiredImages([]);

      expect(result.priority.map((image) => image.displayName)).toEqual([
        'Recommended (Release r21.0.1_c0021.001)',
        'Release r21.0.1_c0021.001',
      ]);
    });
  });

  test('should use the configured registry host', async () => {
    const registry = new MemoryRegistry().push(REPO, { r21_0_0: 'sha256:r21' });
    const hosts: string[] = [];
    const ranked = new RankedStrategy(
      { repo: REPO, registry_url: 'registry.example.com', num_releases: 1, num_weeklies: 0, num_dailies: 0 },
      {
        registryFor: (host) => {
          hosts.push(host);
          return registry;
        },
      },
    );

    const result = await ranked.desiredImages([]);

    expect(hosts).toEqual(['registry.example.com']);
    expect(result.priority[0].imageURL).toBe(`registry.example.com/${REPO}:r21_0_0`);
  });

  test('should propagate registry failures', async () => {
    const registry = new MemoryRegistry();
    registry.failing = true;

    await expect(strategy(registry).desiredImages([])).rejects.toBeInstanceOf(RegistryError);
  });
});
