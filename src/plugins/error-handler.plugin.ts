// ============================================
// CAPITOL - Error Handler Plugin
// ============================================

import { FastifyPluginAsync, FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { ZodError } from 'zod';
import { isDevelopment } from '../config/env.js';
import type { TurnReport } from '../models/types.js';

/** Where a fault happened, enough to reproduce it from the same seed */
export interface FaultContext {
  turn?: number;
  actor?: string;
  entityId?: string;
  [key: string]: unknown;
}

// Custom error classes
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code: string = 'INTERNAL_ERROR'
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    super(
      id ? `${resource} with ID '${id}' not found` : `${resource} not found`,
      404,
      'NOT_FOUND'
    );
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, public details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/**
 * Invalid initial setup (rules or scenario). Raised before any turn runs.
 */
export class ConfigurationFault extends AppError {
  constructor(message: string, public details: string[] = []) {
    super(message, 500, 'CONFIGURATION_FAULT');
    this.name = 'ConfigurationFault';
  }
}

/**
 * An invariant would be violated mid-turn. The step is discarded and the last
 * completed turn stays committed; `report` covers the steps that did complete.
 */
export class SimulationFault extends AppError {
  public report?: TurnReport;

  constructor(message: string, public context: FaultContext = {}) {
    super(message, 500, 'SIMULATION_FAULT');
    this.name = 'SimulationFault';
  }
}

/**
 * A persisted snapshot was malformed or broke an invariant. The in-memory
 * simulation is left as it was.
 */
export class LoadError extends AppError {
  constructor(message: string, public issues: string[] = []) {
    super(message, 422, 'LOAD_ERROR');
    this.name = 'LoadError';
  }
}

export class InvalidIntervention extends AppError {
  constructor(message: string, public context: FaultContext = {}) {
    super(message, 409, 'INVALID_INTERVENTION');
    this.name = 'InvalidIntervention';
  }
}

interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    stack?: string;
  };
}

function detailsOf(error: AppError): unknown {
  if (error instanceof ValidationError) return error.details;
  if (error instanceof LoadError) return error.issues;
  if (error instanceof ConfigurationFault) return error.details;
  if (error instanceof SimulationFault) {
    return error.report ? { ...error.context, report: error.report } : error.context;
  }
  if (error instanceof InvalidIntervention) return error.context;
  return undefined;
}

const errorHandlerPluginImpl: FastifyPluginAsync = async (fastify) => {
  // Global error handler
  fastify.setErrorHandler((error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) => {
    const response: ErrorResponse = {
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
      },
    };

    let statusCode = 500;

    // Handle Zod validation errors
    if (error instanceof ZodError) {
      statusCode = 400;
      response.error.code = 'VALIDATION_ERROR';
      response.error.message = 'Validation failed';
      response.error.details = error.issues.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
      }));
    }
    // Handle our custom errors
    else if (error instanceof AppError) {
      statusCode = error.statusCode;
      response.error.code = error.code;
      response.error.message = error.message;
      const details = detailsOf(error);
      if (details !== undefined) {
        response.error.details = details;
      }
    }
    // Handle Fastify validation errors
    else if ('validation' in error && error.validation) {
      statusCode = 400;
      response.error.code = 'VALIDATION_ERROR';
      response.error.message = 'Request validation failed';
      response.error.details = error.validation;
    }
    // Handle other errors
    else {
      response.error.message = error.message || 'An unexpected error occurred';
    }

    // Include stack trace in development
    if (isDevelopment() && error.stack) {
      response.error.stack = error.stack;
    }

    const logPayload = {
      err: error,
      request: {
        method: request.method,
        url: request.url,
        params: request.params,
      },
    };
    if (statusCode >= 500) {
      request.log.error(logPayload);
    } else {
      request.log.warn(logPayload);
    }

    reply.status(statusCode).send(response);
  });

  // 404 handler
  fastify.setNotFoundHandler((request, reply) => {
    reply.status(404).send({
      error: {
        code: 'NOT_FOUND',
        message: `Route ${request.method} ${request.url} not found`,
      },
    });
  });
};

// Wrap with fastify-plugin so the handlers cover every controller
export const errorHandlerPlugin = fp(errorHandlerPluginImpl, {
  name: 'capitol-error-handler',
});
