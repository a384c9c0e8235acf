import type { FastifyInstance } from 'fastify';
import type { TargetDescriptor } from '../types/Terminal.js';

export interface HostLister {
  list(): TargetDescriptor[];
}

export async function hostRoutes(app: FastifyInstance, hosts: HostLister) {
  // Configured targets a terminal can be opened to; credentials stay server-side
  app.get('/api/hosts', async () => ({
    hosts: hosts.list().map(h => ({
      id: h.id,
      name: h.name,
      host: h.host,
      port: h.port,
      username: h.username,
    })),
  }));
}
