import { describe, expect, it } from 'vitest';
import { checkHealth } from './server.js';

const now = new Date('2024-03-01T08:00:00.000Z');

describe('checkHealth', () => {
  it('is ok with no checks', async () => {
    expect(await checkHealth('quality-engine', {}, now)).toEqual({
      status: 'ok',
      service: 'quality-engine',
      checks: {},
      timestamp: '2024-03-01T08:00:00.000Z',
    });
  });

  it('reports each failing dependency and degrades', async () => {
    const report = await checkHealth(
      'quality-engine',
      {
        database: async () => 1,
        redis: async () => {
          throw new Error('connection refused');
        },
      },
      now,
    );
    expect(report.status).toBe('degraded');
    expect(report.checks).toEqual({ database: 'ok', redis: 'failed' });
  });
});
