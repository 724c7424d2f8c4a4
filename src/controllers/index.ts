// ============================================
// CAPITOL - Controllers Barrel Export & Registration
// ============================================

import { FastifyInstance } from 'fastify';
import { simulationController } from './simulation.controller.js';

export async function registerControllers(fastify: FastifyInstance): Promise<void> {
  await fastify.register(simulationController);
}

// Export individual controllers for testing
export { simulationController };
