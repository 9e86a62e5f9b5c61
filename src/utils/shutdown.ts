import { Logger, createLogger, errorMessage } from './logger';

export interface ShutdownStep {
  name: string;
  close: () => Promise<unknown>;
}

/**
 * Close resources in order. A failing step is logged and the rest still run.
 * Resolves to the process exit code.
 */
export async function closeAll(steps: ShutdownStep[], logger: Logger = createLogger('shutdown')): Promise<number> {
  let exitCode = 0;

  for (const { name, close } of steps) {
    try {
      await close();
      logger.info(`✓ Closed ${name}`);
    } catch (error) {
      exitCode = 1;
      logger.error(`❌ Failed to close ${name}`, { error: errorMessage(error) });
    }
  }

  return exitCode;
}
