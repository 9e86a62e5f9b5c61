import { Request, Response } from 'express';
import { z } from 'zod';
import { respondWithError } from '../middleware/error-handler';
import { TaskStore } from '../repositories/task.repository';
import { EnrichmentOutcome, EnrichmentService } from '../services/ai/enrichment.service';
import { ENRICHMENT_STATUSES } from '../types/task.types';
import { NotFoundError } from '../utils/errors';

export type EnqueueEnrichment = (taskId: string, version: number) => Promise<void>;

const createTaskSchema = z.object({
  title: z.string().trim().min(1).max(255).optional(),
  description: z.string().trim().min(1).max(10000),
});

const updateTaskSchema = z.object({
  description: z.string().trim().min(1).max(10000),
});

const listQuerySchema = z.object({
  status: z.enum(ENRICHMENT_STATUSES).optional(),
  limit: z.coerce.number().int().min(1).max(200).optional(),
});

const similarQuerySchema = z.object({
  k: z.coerce.number().int().min(1).max(50).default(5),
});

function sendOutcome(res: Response, outcome: EnrichmentOutcome): void {
  switch (outcome.status) {
    case 'complete':
      res.json({ status: outcome.status, task: outcome.task });
      return;
    case 'failed':
      // partial success: the task keeps whatever was derived
      res.status(207).json({ status: outcome.status, task: outcome.task, failures: outcome.failures });
      return;
    case 'already_running':
      res.status(409).json({ status: outcome.status, error: outcome.reason.message });
      return;
    case 'stale':
      res.status(409).json({
        status: outcome.status,
        error: 'Task description changed while enriching; result discarded',
        startedVersion: outcome.startedVersion,
      });
      return;
  }
}

/**
 * Task endpoints that drive the enrichment pipeline.
 * Plain CRUD stays thin; anything touching derived fields goes through EnrichmentService.
 */
export class TaskController {
  constructor(
    private readonly tasks: TaskStore,
    private readonly enrichment: EnrichmentService,
    private readonly enqueue: EnqueueEnrichment,
  ) {}

  /**
   * POST /api/tasks
   */
  async create(req: Request, res: Response): Promise<void> {
    const parsed = createTaskSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Description is required', issues: parsed.error.issues });
      return;
    }

    try {
      const task = await this.tasks.create(parsed.data);
      await this.enqueue(task.id, task.enrichment_version);
      res.status(201).json({ task });
    } catch (error) {
      respondWithError(res, error, 'Failed to create task');
    }
  }

  /**
   * GET /api/tasks?status=failed&limit=20
   */
  async list(req: Request, res: Response): Promise<void> {
    const parsed = listQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid query', issues: parsed.error.issues });
      return;
    }

    try {
      const tasks = await this.tasks.list(parsed.data);
      res.json({ tasks });
    } catch (error) {
      respondWithError(res, error, 'Failed to list tasks');
    }
  }

  /**
   * GET /api/tasks/:id
   */
  async get(req: Request, res: Response): Promise<void> {
    try {
      const { id } = req.params;
      const task = await this.tasks.findById(id);
      if (!task) throw new NotFoundError('Task', id);
      res.json({ task });
    } catch (error) {
      respondWithError(res, error, 'Failed to load task');
    }
  }

  /**
   * PATCH /api/tasks/:id: edit description, re-enrich in the background
   */
  async update(req: Request, res: Response): Promise<void> {
    const parsed = updateTaskSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Description is required', issues: parsed.error.issues });
      return;
    }

    try {
      const { id } = req.params;
      const task = await this.enrichment.updateDescription(id, parsed.data.description);
      if (task.enrichment_status === 'pending') {
        await this.enqueue(task.id, task.enrichment_version);
      }
      res.json({ task });
    } catch (error) {
      respondWithError(res, error, 'Failed to update task');
    }
  }

  /**
   * DELETE /api/tasks/:id: removes the vector too
   */
  async remove(req: Request, res: Response): Promise<void> {
    try {
      await this.enrichment.deleteTask(req.params.id);
      res.json({ success: true });
    } catch (error) {
      respondWithError(res, error, 'Failed to delete task');
    }
  }

  /**
   * POST /api/tasks/:id/enrich: run the pipeline now and wait for it
   */
  async enrich(req: Request, res: Response): Promise<void> {
    try {
      const outcome = await this.enrichment.enrich(req.params.id);
      sendOutcome(res, outcome);
    } catch (error) {
      respondWithError(res, error, 'Failed to enrich task');
    }
  }

  /**
   * POST /api/tasks/:id/retry
   */
  async retry(req: Request, res: Response): Promise<void> {
    try {
      const outcome = await this.enrichment.retry(req.params.id);
      sendOutcome(res, outcome);
    } catch (error) {
      respondWithError(res, error, 'Failed to retry enrichment');
    }
  }

  /**
   * GET /api/tasks/:id/similar?k=5
   */
  async similar(req: Request, res: Response): Promise<void> {
    const parsed = similarQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid query', issues: parsed.error.issues });
      return;
    }

    try {
      const similar = await this.enrichment.findSimilar(req.params.id, parsed.data.k);
      res.json({
        similar: similar.map(({ task, distance }) => ({ task, distance: Number(distance.toFixed(4)) })),
      });
    } catch (error) {
      respondWithError(res, error, 'Failed to find similar tasks');
    }
  }
}
