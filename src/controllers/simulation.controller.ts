// ============================================
// CAPITOL - Simulation Controller
// ============================================

import { FastifyPluginAsync } from 'fastify';
import {
  advanceSchema,
  policiesQuerySchema,
  proposePolicySchema,
  saveBodySchema,
  saveParamSchema,
  triggerEventSchema,
} from '../schemas/index.js';

export const simulationController: FastifyPluginAsync = async (fastify) => {
  const simulation = fastify.simulation;

  // Headline state: clock, chambers, parties, economy
  fastify.get('/api/simulation/state', async () => {
    return simulation.getOverview();
  });

  // Full persisted snapshot
  fastify.get('/api/simulation/snapshot', async (request, reply) => {
    reply.type('application/json');
    return simulation.getSnapshot();
  });

  fastify.post('/api/simulation/advance', async (request) => {
    const body = advanceSchema.parse(request.body);
    return simulation.advance(body.months);
  });

  // === Manual interventions ===

  fastify.get('/api/simulation/policies', async (request) => {
    const query = policiesQuerySchema.parse(request.query);
    return { policies: simulation.listPolicies(query.status) };
  });

  fastify.post('/api/simulation/policies', async (request, reply) => {
    const body = proposePolicySchema.parse(request.body);
    const policy = simulation.proposePolicy(body);

    reply.status(201);
    return { policy };
  });

  fastify.post('/api/simulation/events', async (request, reply) => {
    const body = triggerEventSchema.parse(request.body);
    const trigger = simulation.triggerEvent(body);

    reply.status(202);
    return { trigger };
  });

  // === Saves ===

  fastify.get('/api/simulation/saves', async () => {
    return { saves: await simulation.listSaves() };
  });

  fastify.post('/api/simulation/saves', async (request, reply) => {
    const body = saveBodySchema.parse(request.body);
    const save = await simulation.save(body.name);

    reply.status(201);
    return { save };
  });

  fastify.post('/api/simulation/saves/:name/load', async (request) => {
    const params = saveParamSchema.parse(request.params);
    const save = await simulation.load(params.name);
    return { save, state: simulation.getOverview() };
  });

  fastify.delete('/api/simulation/saves/:name', async (request, reply) => {
    const params = saveParamSchema.parse(request.params);
    await simulation.deleteSave(params.name);
    return reply.status(204).send();
  });
};
