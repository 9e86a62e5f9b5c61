import { Router } from 'express';
import { AIController } from '../controllers/ai.controller';
import { TaskController } from '../controllers/task.controller';
import { enqueueEnrichment } from '../jobs/queue';
import { enrichmentService, llmGateway, taskRepository } from '../services';
import { DEFAULT_CATEGORIES } from '../services/ai/enrichment.service';
import healthRoutes from './health.routes';
import { createTaskRouter } from './task.routes';
import { createAIRouter } from './ai.routes';

const router = Router();

// Mount routes
router.use('/health', healthRoutes);
router.use('/api/tasks', createTaskRouter(new TaskController(taskRepository, enrichmentService, enqueueEnrichment)));
router.use('/api/ai', createAIRouter(new AIController(llmGateway, DEFAULT_CATEGORIES)));

export default router;
