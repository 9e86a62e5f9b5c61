import { Router } from 'express';
import { AIController } from '../controllers/ai.controller';

export function createAIRouter(aiController: AIController): Router {
  const router = Router();

  router.post('/classify', (req, res) => aiController.classify(req, res));
  router.post('/estimate-time', (req, res) => aiController.estimateTime(req, res));
  router.post('/recommend-priority', (req, res) => aiController.recommendPriority(req, res));

  return router;
}
