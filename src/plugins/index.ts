// ============================================
// CAPITOL - Plugins Barrel Export
// ============================================

export {
  errorHandlerPlugin,
  AppError,
  NotFoundError,
  ValidationError,
  ConfigurationFault,
  SimulationFault,
  LoadError,
  InvalidIntervention,
  type FaultContext,
} from './error-handler.plugin.js';
export { simulationPlugin, type SimulationPluginOptions } from './simulation.plugin.js';
