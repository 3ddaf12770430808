/**
 * Target controller - keeps one target's nodes stocked with its desired
 * images, one pull job at a time
 *
 * Each tick lists nodes, intersects their caches, asks the strategies for
 * desired images and then either starts a pull for the first missing image
 * (when idle) or follows the outstanding pull (when pulling). A pull job
 * created in a tick is first inspected on the next one.
 */

import { intersectCaches } from '../cache/intersector';
import { ClusterPort } from '../cluster/port';
import { PullJobNotFoundError, errorMessage } from '../errors';
import { createLogger, Logger } from '../logger';
import { DesiredImageStrategy } from '../strategies/types';
import { CachedImage, DesiredImage, Labels, PullJobHandle, TargetSnapshot } from '../types';

const baseLogger = createLogger('target-controller');

export interface TargetDefinition {
  name: string;
  labels: Labels;
  strategies: DesiredImageStrategy[];
}

export type ControllerState =
  | { phase: 'idle' }
  | { phase: 'pulling'; job: PullJobHandle; imageURL: string };

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface TargetControllerOptions {
  cluster: ClusterPort;
  intervalMs: number;
  pullSecretName?: string;
  sleep?: Sleep;
  now?: () => Date;
  logger?: Logger;
}

export type TickResult = { ok: true } | { ok: false; error: Error };

/**
 * Resolves after `ms`, or as soon as the signal aborts.
 */
export const abortableSleep: Sleep = (ms, signal) => new Promise((resolve) => {
  if (signal.aborted) {
    resolve();
    return;
  }
  const onAbort = () => {
    clearTimeout(timer);
    resolve();
  };
  const timer = setTimeout(() => {
    signal.removeEventListener('abort', onAbort);
    resolve();
  }, ms);
  signal.addEventListener('abort', onAbort, { once: true });
});

/**
 * Settles with `work`, or with undefined as soon as the signal aborts.
 */
export function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T | undefined> {
  if (signal.aborted) {
    return Promise.resolve(undefined);
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => resolve(undefined);
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * A desired image is available when the common cache holds its URL with
 * the wanted digest, or with any digest when none is wanted.
 */
export function partitionAvailability(
  desired: readonly DesiredImage[],
  commonCache: readonly CachedImage[],
): { available: DesiredImage[]; missing: DesiredImage[] } {
  const available: DesiredImage[] = [];
  const missing: DesiredImage[] = [];
  for (const image of desired) {
    const cached = commonCache.some((c) =>
      c.imageURL === image.imageURL && (image.digest === null || c.digest === image.digest));
    (cached ? available : missing).push(image);
  }
  return { available, missing };
}

export class TargetController {
  readonly name: string;
  private state: ControllerState = { phase: 'idle' };
  private current: TargetSnapshot;
  private inFlight: Promise<TickResult> | null = null;
  /** Set by release(); a tick still in flight then starts no pull */
  private retired = false;
  private readonly cluster: ClusterPort;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(private readonly target: TargetDefinition, private readonly options: TargetControllerOptions) {
    this.name = target.name;
    this.cluster = options.cluster;
    this.sleep = options.sleep ?? abortableSleep;
    this.now = options.now ?? (() => new Date());
    this.logger = (options.logger ?? baseLogger).child({ target: target.name });
    this.current = {
      name: target.name,
      labels: { ...target.labels },
      commonCache: [],
      available: [],
      desired: [],
      missing: [],
      all: [],
      pulling: null,
      lastCheckedAt: null,
      lastError: null,
    };
  }

  get phase(): ControllerState['phase'] {
    return this.state.phase;
  }

  snapshot(): TargetSnapshot {
    return {
      ...this.current,
      labels: { ...this.current.labels },
      commonCache: [...this.current.commonCache],
      available: [...this.current.available],
      desired: [...this.current.desired],
      missing: [...this.current.missing],
      all: [...this.current.all],
    };
  }

  /**
   * One pass of the control loop. Never throws; a failed tick leaves the
   * state and snapshot as they were apart from `lastError`. Overlapping
   * calls share the tick in progress.
   */
  tick(): Promise<TickResult> {
    if (!this.inFlight) {
      this.inFlight = this.runTick().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /**
   * Tick, then sleep, until the signal aborts. An abort also stops the wait
   * on a tick in progress; that tick finishes on its own.
   */
  async run(signal: AbortSignal): Promise<void> {
    this.logger.info('Starting control loop every %dms', this.options.intervalMs);
    while (!signal.aborted) {
      await untilAborted(this.tick(), signal);
      if (signal.aborted) break;
      await this.sleep(this.options.intervalMs, signal);
    }
    this.logger.info('Control loop stopped');
  }

  /**
   * Delete the outstanding pull job, if any, and start no further pulls.
   * Used when the target goes away.
   */
  async release(): Promise<void> {
    this.retired = true;
    if (this.state.phase !== 'pulling') {
      return;
    }
    const { job } = this.state;
    try {
      await this.cluster.deletePullJob(job);
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to delete pull job %s', job.name);
      throw error;
    }
    this.state = { phase: 'idle' };
  }

  private async runTick(): Promise<TickResult> {
    try {
      const nodes = await this.cluster.listNodes();
      const { images: commonCache, matchedNodes } = intersectCaches(nodes, this.target.labels, this.logger);

      const desired: DesiredImage[] = [];
      const all: DesiredImage[] = [];
      for (const strategy of this.target.strategies) {
        const images = await strategy.desiredImages(commonCache);
        desired.push(...images.priority);
        all.push(...images.all);
      }

      const { available, missing } = partitionAvailability(desired, commonCache);

      if (this.state.phase === 'idle') {
        await this.startPull(missing, matchedNodes);
      } else {
        await this.followPull(this.state.job);
      }

      this.current = {
        name: this.target.name,
        labels: { ...this.target.labels },
        commonCache: [...commonCache],
        available,
        desired,
        missing,
        all,
        pulling: this.state.phase === 'pulling' ? this.state.imageURL : null,
        lastCheckedAt: this.now().toISOString(),
        lastError: null,
      };
      return { ok: true };
    } catch (error) {
      this.logger.error({ err: error }, 'Tick failed: %s', errorMessage(error));
      this.current = { ...this.current, lastError: errorMessage(error) };
      return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
    }
  }

  private async startPull(missing: readonly DesiredImage[], matchedNodes: number): Promise<void> {
    if (missing.length === 0) {
      return;
    }
    if (matchedNodes === 0) {
      this.logger.warn('%d images missing but no node matches the selector', missing.length);
      return;
    }

    if (this.retired) {
      return;
    }

    const wanted = missing[0].imageURL;
    const job = await this.cluster.createPullJob({
      name: this.target.name,
      imageURL: wanted,
      labels: { ...this.target.labels },
      pullSecretName: this.options.pullSecretName || undefined,
    });
    if (this.retired) {
      // Released while the job was being created
      await this.cluster.deletePullJob(job);
      return;
    }

    const imageURL = job.imageURL ?? wanted;
    this.state = { phase: 'pulling', job, imageURL };
    if (imageURL !== wanted) {
      this.logger.warn('Adopted pull job %s is pulling %s rather than %s', job.name, imageURL, wanted);
    }
    this.logger.info('Pulling %s (%d missing)', imageURL, missing.length);
  }

  private async followPull(job: PullJobHandle): Promise<void> {
    try {
      const status = await this.cluster.getPullJobStatus(job);
      if (!status.finished) {
        this.logger.debug('Pull job %s: %d of %d nodes ready', job.name, status.ready, status.desired);
        return;
      }
    } catch (error) {
      if (error instanceof PullJobNotFoundError) {
        this.logger.warn('Pull job %s disappeared', job.name);
        this.state = { phase: 'idle' };
        return;
      }
      throw error;
    }

    await this.cluster.deletePullJob(job);
    this.logger.info('Pull job %s finished', job.name);
    this.state = { phase: 'idle' };
  }
}
