import { Server } from 'http';
import app from './app';
import { config, validateConfig } from './config';
import { pool, vectorPool } from './config/database';
import { redis } from './config/redis';
import { enrichmentQueue } from './jobs/queue';
import { scheduleReconciliation } from './jobs/schedulers/reconcile.scheduler';
import { ShutdownStep, closeAll } from './utils/shutdown';

let server: Server | undefined;
let shuttingDown = false;

function closeServer(): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!server) return resolve();
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Stop taking requests, then close the queue, Redis and the pg pools, in that order.
 */
async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`${signal} received, shutting down...`);

  const steps: ShutdownStep[] = [
    { name: 'http server', close: closeServer },
    { name: 'enrichment queue', close: () => enrichmentQueue.close() },
    { name: 'redis', close: () => redis.quit() },
    { name: 'database pool', close: () => pool.end() },
  ];
  if (vectorPool !== pool) {
    steps.push({ name: 'vector pool', close: () => vectorPool.end() });
  }

  process.exit(await closeAll(steps));
}

async function startServer() {
  try {
    // Validate environment variables
    validateConfig();

    // Test database connection
    await pool.query('SELECT 1');
    console.log('✓ Database connected');

    // Test Redis connection
    await redis.ping();
    console.log('✓ Redis connected');

    // Initialize scheduled jobs
    await scheduleReconciliation();
    console.log('✓ Scheduled jobs initialized');

    // Start server
    const port = config.port;
    server = app.listen(port, () => {
      console.log('');
      console.log(`🚀 Task enrichment service running on port ${port}`);
      console.log(`🌍 Environment: ${config.nodeEnv}`);
      console.log(`🧠 Stages: ${Object.entries(config.enrichment.stages).filter(([, on]) => on).map(([name]) => name).join(', ')}`);
      console.log(`📐 Embeddings: ${config.embedding.provider} (${config.embedding.dimension}d) → ${config.vector.backend}`);
      console.log('');
      console.log('Endpoints:');
      console.log(`  GET    /health`);
      console.log(`  GET    /health/integrations`);
      console.log(`  POST   /api/tasks`);
      console.log(`  GET    /api/tasks/:id`);
      console.log(`  PATCH  /api/tasks/:id`);
      console.log(`  DELETE /api/tasks/:id`);
      console.log(`  POST   /api/tasks/:id/enrich`);
      console.log(`  POST   /api/tasks/:id/retry`);
      console.log(`  GET    /api/tasks/:id/similar`);
      console.log(`  POST   /api/ai/classify | /estimate-time | /recommend-priority`);
      console.log('');
    });
  } catch (error) {
    console.error('❌ Failed to start server:', error);
    process.exit(1);
  }
}

process.once('SIGTERM', () => void shutdown('SIGTERM'));
process.once('SIGINT', () => void shutdown('SIGINT'));

void startServer();
