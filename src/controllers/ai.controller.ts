import { Request, Response } from 'express';
import { z } from 'zod';
import { respondWithError } from '../middleware/error-handler';
import { LLMGateway, ResultByTemplate } from '../services/ai/llm-gateway.service';
import { TemplateName } from '../services/ai/prompt-templates';

const describeSchema = z.object({
  description: z.string().trim().min(1).max(10000),
});

/**
 * One-off AI calls on a raw description, without touching any task
 */
export class AIController {
  constructor(
    private readonly gateway: LLMGateway,
    private readonly categories: string[],
  ) {}

  /**
   * POST /api/ai/classify
   */
  async classify(req: Request, res: Response): Promise<void> {
    await this.run(req, res, 'classify_task', (result) => ({ category: result.label, confidence: result.confidence }));
  }

  /**
   * POST /api/ai/estimate-time
   */
  async estimateTime(req: Request, res: Response): Promise<void> {
    await this.run(req, res, 'estimate_time', (result) => ({
      estimated_minutes: result.minutes,
      confidence: result.confidence,
    }));
  }

  /**
   * POST /api/ai/recommend-priority
   */
  async recommendPriority(req: Request, res: Response): Promise<void> {
    await this.run(req, res, 'recommend_priority', (result) => ({
      priority: result.priority,
      confidence: result.confidence,
    }));
  }

  private async run<K extends TemplateName>(
    req: Request,
    res: Response,
    template: K,
    present: (result: ResultByTemplate[K]) => Record<string, unknown>,
  ): Promise<void> {
    const parsed = describeSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Description is required' });
      return;
    }

    try {
      const result = await this.gateway.invoke(template, {
        description: parsed.data.description,
        categories: this.categories.join(', '),
      });
      res.json(present(result));
    } catch (error) {
      respondWithError(res, error, 'AI request failed');
    }
  }
}
