import type { FastifyError, FastifyRequest, FastifyReply } from 'fastify';
import {
  AppError,
  MethodNotAllowedError,
  OperatorError,
  PipelineTimeoutError,
  ValidationError,
} from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { ZodError } from 'zod';

interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
  details?: unknown;
  errorId?: string;
}

/**
 * Caller-facing message for a failed node; the cause stays in the logs
 */
export const OPERATOR_FAILURE_MESSAGE = 'Requested process failed';

/**
 * Caller-facing message for an abandoned walk; pipeline and node names stay in the logs
 */
export const TIMEOUT_MESSAGE = 'Request deadline exceeded';

/**
 * Global error handler for Fastify
 */
export function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply
): void {
  const logger = getLogger();

  // Handle Zod validation errors
  if (error instanceof ZodError) {
    const validationError = new ValidationError('Validation failed', error.format());
    reply.status(validationError.statusCode).send({
      error: validationError.code,
      message: validationError.message,
      statusCode: validationError.statusCode,
      details: validationError.details,
    } satisfies ErrorResponse);
    return;
  }

  // Already logged with its cause by the runner
  if (error instanceof OperatorError) {
    reply.status(error.statusCode).send({
      error: error.code,
      message: OPERATOR_FAILURE_MESSAGE,
      statusCode: error.statusCode,
      errorId: error.errorId,
    } satisfies ErrorResponse);
    return;
  }

  // Logged with pipeline and node by the runner
  if (error instanceof PipelineTimeoutError) {
    reply.status(error.statusCode).send({
      error: error.code,
      message: TIMEOUT_MESSAGE,
      statusCode: error.statusCode,
    } satisfies ErrorResponse);
    return;
  }

  // Handle custom application errors
  if (error instanceof AppError) {
    if (!error.isOperational) {
      logger.error({ err: error, requestId: request.id }, 'Non-operational error occurred');
    } else {
      logger.warn({ err: error, requestId: request.id }, 'Operational error occurred');
    }

    const response: ErrorResponse = {
      error: error.code,
      message: error.message,
      statusCode: error.statusCode,
    };

    if (error instanceof ValidationError && error.details) {
      response.details = error.details;
    }

    if (error instanceof MethodNotAllowedError) {
      reply.header('allow', error.allowed.join(', '));
    }

    reply.status(error.statusCode).send(response);
    return;
  }

  // Fastify client errors (body too large, unsupported media type)
  if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
    logger.warn({ err: error, requestId: request.id }, 'Request rejected');
    reply.status(error.statusCode).send({
      error: error.code,
      message: error.message,
      statusCode: error.statusCode,
    } satisfies ErrorResponse);
    return;
  }

  // Unknown errors
  logger.error({ err: error, requestId: request.id }, 'Unhandled error occurred');

  reply.status(500).send({
    error: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    statusCode: 500,
  } satisfies ErrorResponse);
}
