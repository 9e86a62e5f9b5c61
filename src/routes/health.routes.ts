import { Router } from 'express';
import { config } from '../config';
import { pool, vectorPool } from '../config/database';
import { redis } from '../config/redis';
import { HealthController, IntegrationCheck } from '../controllers/health.controller';

const checks: Record<string, IntegrationCheck> = {
  database: () => pool.query('SELECT 1'),
  redis: () => redis.ping(),
};
if (config.vector.backend === 'pgvector') {
  checks.vector = () => vectorPool.query('SELECT 1 FROM task_embeddings LIMIT 1');
}

const healthController = new HealthController(checks);

const router = Router();

router.get('/', (req, res) => healthController.check(req, res));
router.get('/integrations', (req, res) => healthController.checkIntegrations(req, res));

export default router;
