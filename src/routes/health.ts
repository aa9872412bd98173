// Health route
import type { FastifyPluginAsync } from 'fastify';

export interface HealthRoutesOptions {
  modelConfigured: boolean;
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (server, opts) => {
  server.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: '1.0.0',
      model_configured: opts.modelConfigured,
    };
  });
};
