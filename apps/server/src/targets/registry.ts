/**
 * Target registry - runs one controller loop per target name
 *
 * The map is only touched synchronously: putting or removing a target takes
 * the old entry out and aborts it, without waiting on the cluster. A new loop
 * for the same name is chained behind the old one's shutdown (loop exit, then
 * pull job deletion), so a name never has two running loops and a slow
 * target never holds up the others.
 */

import { PrewarmError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import { TargetSnapshot } from '../types';
import { TargetController, TargetDefinition } from './controller';

const logger = createLogger('target-registry');

export type ControllerFactory = (definition: TargetDefinition) => TargetController;

interface RunningTarget {
  controller: TargetController;
  abort: AbortController;
  /** Settles once the loop has exited */
  done: Promise<void>;
}

export class TargetRegistry {
  private readonly targets = new Map<string, RunningTarget>();
  /** Shutdowns still in progress, awaited by close() */
  private readonly stopping = new Set<Promise<void>>();
  private closed = false;

  constructor(private readonly createController: ControllerFactory) {}

  /**
   * Start a target, replacing any running target of the same name. Resolves
   * without waiting for the replaced loop to wind down.
   */
  async put(definition: TargetDefinition): Promise<TargetSnapshot> {
    if (this.closed) {
      throw new PrewarmError('Target registry is closed');
    }

    const controller = this.createController(definition);
    const previous = this.detach(definition.name);
    const abort = new AbortController();
    const start = () => controller.run(abort.signal);
    const done = (previous ? previous.then(start) : start()).catch((error: unknown) => {
      logger.error({ err: error }, 'Control loop for %s ended: %s', definition.name, errorMessage(error));
    });
    this.targets.set(definition.name, { controller, abort, done });
    logger.info('Started target %s', definition.name);
    return controller.snapshot();
  }

  /**
   * Stop and forget a target, resolving once its loop has exited and its
   * pull job is deleted. Unknown names are ignored.
   */
  async remove(name: string): Promise<void> {
    await this.detach(name);
  }

  get(name: string): TargetController | undefined {
    return this.targets.get(name)?.controller;
  }

  list(): string[] {
    return [...this.targets.keys()];
  }

  /**
   * Stop every target; later calls to put fail.
   */
  async close(): Promise<void> {
    this.closed = true;
    const detached = this.list().map((name) => this.detach(name));
    await Promise.all([...detached, ...this.stopping]);
  }

  /**
   * Take a target out of the map and abort its loop. Returns its shutdown,
   * or null when nothing by that name is running.
   */
  private detach(name: string): Promise<void> | null {
    const running = this.targets.get(name);
    if (!running) {
      return null;
    }
    this.targets.delete(name);
    running.abort.abort();

    const stopped = running.done.then(() => this.release(name, running.controller));
    this.stopping.add(stopped);
    return stopped.finally(() => {
      this.stopping.delete(stopped);
    });
  }

  private async release(name: string, controller: TargetController): Promise<void> {
    try {
      await controller.release();
    } catch (error) {
      logger.warn('Pull job of %s left behind: %s', name, errorMessage(error));
    }
    logger.info('Stopped target %s', name);
  }
}
