import { Request, Response } from 'express';

export type IntegrationCheck = () => Promise<unknown>;

export class HealthController {
  constructor(private readonly checks: Record<string, IntegrationCheck>) {}

  /**
   * Basic health check
   */
  async check(_req: Request, res: Response): Promise<void> {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  }

  /**
   * Check integrations (database, redis, vector index)
   */
  async checkIntegrations(_req: Request, res: Response): Promise<void> {
    const integrations: Record<string, 'ok' | 'error'> = {};

    for (const [name, check] of Object.entries(this.checks)) {
      try {
        await check();
        integrations[name] = 'ok';
      } catch (error) {
        integrations[name] = 'error';
        console.error(`${name} health check failed:`, error);
      }
    }

    const allOk = Object.values(integrations).every((status) => status === 'ok');

    res.status(allOk ? 200 : 503).json({
      status: allOk ? 'ok' : 'degraded',
      integrations,
      timestamp: new Date().toISOString(),
    });
  }
}
