/**
 * Error Handler Plugin
 * 
 * Global error handling for Fastify.
 */

import type { FastifyPluginAsync, FastifyError, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import { ZodError } from 'zod';
import { FlightLogError } from '@flightlog/core';

interface ApiError {
  statusCode: number;
  error: string;
  message: string;
  code?: string;
  details?: unknown;
}

export interface ErrorHandlerOptions {
  /** Hide internal error messages from clients */
  production?: boolean;
}

const errorHandlerPlugin: FastifyPluginAsync<ErrorHandlerOptions> = async (fastify, options) => {
  fastify.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    const { log } = request;

    // Zod validation errors
    if (error instanceof ZodError) {
      const apiError: ApiError = {
        statusCode: 400,
        error: 'Validation Error',
        message: 'Request validation failed',
        details: error.errors.map(e => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      };
      
      log.warn({ err: error }, 'Validation error');
      return reply.status(400).send(apiError);
    }

    // Application errors carry their own status
    if (error instanceof FlightLogError) {
      const apiError: ApiError = {
        statusCode: error.statusCode,
        error: error.name,
        message: error.statusCode >= 500 && options.production
          ? 'An unexpected error occurred'
          : error.message,
        code: error.code,
      };

      if (error.statusCode >= 500) {
        log.error({ err: error }, 'Request failed');
      } else {
        log.warn({ err: error }, 'Request rejected');
      }
      return reply.status(error.statusCode).send(apiError);
    }

    // Known HTTP errors (multipart limits, malformed bodies, ...)
    if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
      const apiError: ApiError = {
        statusCode: error.statusCode,
        error: error.name || 'Bad Request',
        message: error.message,
        code: error.code,
      };
      
      log.warn({ err: error }, 'Client error');
      return reply.status(error.statusCode).send(apiError);
    }

    // Internal server errors
    log.error({ err: error }, 'Internal server error');
    
    const apiError: ApiError = {
      statusCode: 500,
      error: 'Internal Server Error',
      message: options.production 
        ? 'An unexpected error occurred' 
        : error.message,
    };

    return reply.status(500).send(apiError);
  });

  // Handle 404
  fastify.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) => {
    const apiError: ApiError = {
      statusCode: 404,
      error: 'Not Found',
      message: `Route ${request.method} ${request.url} not found`,
    };
    
    return reply.status(404).send(apiError);
  });
};

export const errorHandler = fp(errorHandlerPlugin, {
  name: 'error-handler',
});
