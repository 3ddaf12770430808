/**
 * Targets API routes - create, inspect and remove prewarm targets
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { errorMessage } from '../errors';
import { createLogger } from '../logger';
import { StrategyContext, createStrategy, strategyConfigSchema } from '../strategies';
import { TargetRegistry } from '../targets/registry';
import { ErrorResponse, ImagesResponse } from '../types';

const logger = createLogger('targets-api');

/** DNS-1123 label: the name doubles as the pull job name */
const targetNameSchema = z.string()
  .max(63)
  .regex(/^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/, 'must be lowercase alphanumerics and dashes');

export const targetSchema = z.object({
  name: targetNameSchema,
  labels: z.record(z.string()).default({}),
  strategies: z.array(strategyConfigSchema).min(1),
});

export type TargetRequest = z.infer<typeof targetSchema>;

export interface TargetsRouterDeps {
  registry: TargetRegistry;
  strategyContext: StrategyContext;
}

export function sendError(res: Response, code: number, message: string, details?: string): void {
  const error: ErrorResponse = { code, message, details };
  res.status(code).json(error);
}

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function createTargetsRouter({ registry, strategyContext }: TargetsRouterDeps): Router {
  const router = Router();

  // GET /targets - List target names
  router.get('/', (_req: Request, res: Response) => {
    res.json(registry.list());
  });

  // POST /targets - Create or replace a target
  router.post('/', async (req: Request, res: Response) => {
    const parsed = targetSchema.safeParse(req.body);
    if (!parsed.success) {
      sendError(res, 400, 'Invalid target', describeIssues(parsed.error));
      return;
    }

    try {
      const { name, labels, strategies } = parsed.data;
      const snapshot = await registry.put({
        name,
        labels,
        strategies: strategies.map((config) => createStrategy(config, strategyContext)),
      });
      res.json(snapshot);
    } catch (error: unknown) {
      logger.error({ err: error }, 'Failed to create target %s', parsed.data.name);
      sendError(res, 500, 'Failed to create target', errorMessage(error));
    }
  });

  // GET /targets/:name - Latest snapshot of a target
  router.get('/:name', (req: Request, res: Response) => {
    const controller = registry.get(req.params.name);
    if (!controller) {
      sendError(res, 404, `Target ${req.params.name} not found`);
      return;
    }
    res.json(controller.snapshot());
  });

  // GET /targets/:name/available - Desired images already cached
  router.get('/:name/available', (req: Request, res: Response) => {
    const controller = registry.get(req.params.name);
    if (!controller) {
      sendError(res, 404, `Target ${req.params.name} not found`);
      return;
    }
    const snapshot = controller.snapshot();
    const body: ImagesResponse = { images: snapshot.available, all: snapshot.all };
    res.json(body);
  });

  // GET /targets/:name/desired - Every desired image, in priority order
  router.get('/:name/desired', (req: Request, res: Response) => {
    const controller = registry.get(req.params.name);
    if (!controller) {
      sendError(res, 404, `Target ${req.params.name} not found`);
      return;
    }
    const snapshot = controller.snapshot();
    const body: ImagesResponse = { images: snapshot.desired, all: snapshot.all };
    res.json(body);
  });

  // DELETE /targets/:name - Stop a target; absent targets are fine
  router.delete('/:name', async (req: Request, res: Response) => {
    try {
      await registry.remove(req.params.name);
      res.json({ success: true });
    } catch (error: unknown) {
      logger.error({ err: error }, 'Failed to remove target %s', req.params.name);
      sendError(res, 500, 'Failed to remove target', errorMessage(error));
    }
  });

  return router;
}
