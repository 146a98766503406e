/**
 * Error Handler Plugin
 * 
 * Global error handling for Fastify.
 */

import type { FastifyPluginAsync, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import { ZodError } from 'zod';
import { ClipsetError } from '@clipset/core';

interface ApiError {
  statusCode: number;
  error: string;
  message: string;
  code?: string;
  details?: unknown;
}

const STATUS_TEXT: Record<number, string> = {
  400: 'Bad Request',
  404: 'Not Found',
  409: 'Conflict',
  500: 'Internal Server Error',
};

function hasStatusCode(error: Error): error is Error & { statusCode: number; code?: string; validation?: unknown } {
  return 'statusCode' in error && typeof error.statusCode === 'number';
}

const errorHandlerPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.setErrorHandler((error: Error, request: FastifyRequest, reply: FastifyReply) => {
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

    // Domain errors carry their own status
    if (error instanceof ClipsetError) {
      const apiError: ApiError = {
        statusCode: error.statusCode,
        error: STATUS_TEXT[error.statusCode] ?? error.name,
        message: error.message,
        code: error.code,
        details: error.details,
      };

      if (error.statusCode >= 500) {
        log.error({ err: error }, 'Export pipeline error');
      } else {
        log.warn({ err: error }, 'Client error');
      }
      return reply.status(error.statusCode).send(apiError);
    }

    // Fastify validation errors and other known HTTP errors
    if (hasStatusCode(error) && error.statusCode >= 400 && error.statusCode < 500) {
      const apiError: ApiError = {
        statusCode: error.statusCode,
        error: error.validation ? 'Validation Error' : STATUS_TEXT[error.statusCode] ?? 'Bad Request',
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
      message: process.env['NODE_ENV'] === 'production'
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
