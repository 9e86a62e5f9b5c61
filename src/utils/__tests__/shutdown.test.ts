import { describe, it, expect, vi } from 'vitest';
import { closeAll } from '../shutdown';
import { createMockLogger } from '../../__tests__/helpers/fakes';

describe('closeAll', () => {
  it('closes every resource in order and reports success', async () => {
    const closed: string[] = [];
    const step = (name: string) => ({
      name,
      close: async () => {
        closed.push(name);
      },
    });

    const exitCode = await closeAll([step('http server'), step('queue'), step('redis'), step('pool')], createMockLogger());

    expect(exitCode).toBe(0);
    expect(closed).toEqual(['http server', 'queue', 'redis', 'pool']);
  });

  it('keeps going after a failed step and exits non-zero', async () => {
    const logger = createMockLogger();
    const pool = vi.fn(async () => undefined);

    const exitCode = await closeAll(
      [
        { name: 'queue', close: async () => Promise.reject(new Error('redis gone')) },
        { name: 'pool', close: pool },
      ],
      logger,
    );

    expect(exitCode).toBe(1);
    expect(pool).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith('❌ Failed to close queue', { error: 'redis gone' });
  });
});
