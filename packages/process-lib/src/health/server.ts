import { createServer, type Server } from 'node:http';
import { createLogger } from '../logger.js';

const logger = createLogger('health');

/** A dependency check; resolves when the dependency answers, rejects otherwise. */
export type HealthCheck = () => Promise<unknown>;

export interface HealthReport {
  status: 'ok' | 'degraded';
  service: string;
  checks: Record<string, 'ok' | 'failed'>;
  timestamp: string;
}

export async function checkHealth(
  service: string,
  checks: Record<string, HealthCheck> = {},
  now: Date = new Date(),
): Promise<HealthReport> {
  const names = Object.keys(checks);
  const outcomes = await Promise.allSettled(names.map((name) => checks[name]()));
  const results: Record<string, 'ok' | 'failed'> = {};
  outcomes.forEach((outcome, i) => {
    const name = names[i];
    results[name] = outcome.status === 'fulfilled' ? 'ok' : 'failed';
    if (outcome.status === 'rejected') {
      logger.warn({ check: name, err: outcome.reason }, 'Health check failed');
    }
  });
  return {
    status: Object.values(results).every((r) => r === 'ok') ? 'ok' : 'degraded',
    service,
    checks: results,
    timestamp: now.toISOString(),
  };
}

/** Serves `GET /health`: 200 when every check passes, 503 otherwise. */
export function startHealthServer(
  port = 8080,
  service = 'service',
  checks: Record<string, HealthCheck> = {},
): Server {
  const server = createServer((req, res) => {
    if (req.url !== '/health') {
      res.writeHead(404);
      res.end();
      return;
    }
    checkHealth(service, checks)
      .then((report) => {
        res.writeHead(report.status === 'ok' ? 200 : 503, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(report));
      })
      .catch((err: unknown) => {
        logger.error({ err }, 'Health report failed');
        res.writeHead(500);
        res.end();
      });
  });
  server.listen(port, () => {
    logger.info({ port, service }, 'Health check server started');
  });
  return server;
}
