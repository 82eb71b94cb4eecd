import type { FastifyInstance } from 'fastify';

export interface HealthRouteDependencies {
  /** Current scheduler state, or undefined when no scheduler runs in this process */
  schedulerState?: () => string;
}

/**
 * GET /health - liveness plus scheduler state
 */
export function registerHealthRoutes(server: FastifyInstance, deps: HealthRouteDependencies = {}): void {
  server.get('/health', () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      scheduler: deps.schedulerState?.() ?? 'DISABLED',
    };
  });
}
