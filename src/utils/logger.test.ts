import { describe, it, expect, vi, afterEach } from 'vitest';

describe('logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.doUnmock('pino');
    vi.resetModules();
  });

  it('should build the base logger from the loaded config', async () => {
    const created: unknown[] = [];
    const fakePino = Object.assign(
      (options: unknown) => {
        created.push(options);
        return { child: () => ({}) };
      },
      { destination: () => ({}) }
    );
    vi.doMock('pino', () => ({ default: fakePino }));
    vi.stubEnv('LOG_LEVEL', 'WARN');
    vi.stubEnv('LOG_PRETTY', 'false');
    vi.resetModules();

    const { logger } = await import('./logger');

    expect(logger).toBeDefined();
    expect(created).toHaveLength(1);
    expect(created[0]).toMatchObject({ level: 'warn' });
    expect(created[0]).not.toHaveProperty('transport');
  });
});
