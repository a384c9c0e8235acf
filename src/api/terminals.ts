import type { FastifyInstance } from 'fastify';
import type { BridgeRegistry } from '../services/BridgeRegistry.js';

export async function terminalRoutes(app: FastifyInstance, registry: BridgeRegistry) {
  // Active terminals, without credentials
  app.get('/api/terminals', async () => ({
    terminals: registry.list(),
  }));
}
