// ============================================
// CAPITOL - Simulation Plugin
// ============================================

import { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { TurnEngine, type TurnEngineOptions } from '../simulation/engine.js';
import { SimulationService } from '../services/index.js';
import type { TurnSummary } from '../models/types.js';

declare module 'fastify' {
  interface FastifyInstance {
    simulation: SimulationService;
  }
}

export interface SimulationPluginOptions {
  engine?: TurnEngineOptions;
}

const simulationPluginImpl: FastifyPluginAsync<SimulationPluginOptions> = async (fastify, options) => {
  const engine = new TurnEngine(options.engine);
  const service = new SimulationService(engine, fastify.db);
  fastify.decorate('simulation', service);

  engine.on('turn', (summary: TurnSummary) => {
    fastify.log.info({
      turn: summary.turn,
      date: summary.date,
      events: summary.eventsFired.map(e => e.key),
      enacted: summary.policiesEnacted.map(p => p.policyId),
      rejected: summary.policiesRejected.map(p => p.policyId),
      elections: summary.electionsResolved.map(e => e.id),
      faults: summary.faults.length,
    }, 'Turn completed');
  });

  fastify.log.info({ seed: engine.seed, clock: engine.clock }, 'Simulation ready');

  fastify.addHook('onClose', async () => {
    engine.removeAllListeners();
  });
};

// Wrap with fastify-plugin to share the decorator with every controller
export const simulationPlugin = fp(simulationPluginImpl, {
  name: 'capitol-simulation',
});
