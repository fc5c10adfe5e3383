import { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { typedLogger } from '@/lib/typed-logger';
import { isDevelopment } from '@/config';
import { normalizeError, statusCodeFor } from '@/utils/api-errors';

/**
 * Format Zod validation errors into per-field messages
 */
export function formatZodErrors(error: ZodError): { message: string; fields: Record<string, string> } {
  const fields: Record<string, string> = {};
  const messages: string[] = [];

  for (const issue of error.issues) {
    const path = issue.path.join('.');
    let fieldMessage = issue.message;

    if (issue.code === 'invalid_type') {
      fieldMessage = `${path} must be ${issue.expected}, received ${issue.received}`;
    } else if (issue.code === 'too_small') {
      if (issue.type === 'string') {
        fieldMessage = `${path} must be at least ${issue.minimum} characters`;
      } else if (issue.type === 'number') {
        fieldMessage = `${path} must be at least ${issue.minimum}`;
      } else if (issue.type === 'array') {
        fieldMessage = `${path} must have at least ${issue.minimum} items`;
      }
    } else if (issue.code === 'too_big') {
      if (issue.type === 'string') {
        fieldMessage = `${path} must be at most ${issue.maximum} characters`;
      } else if (issue.type === 'number') {
        fieldMessage = `${path} must be at most ${issue.maximum}`;
      } else if (issue.type === 'array') {
        fieldMessage = `${path} must have at most ${issue.maximum} items`;
      }
    } else if (issue.code === 'invalid_string' && issue.validation === 'datetime') {
      fieldMessage = `${path} must be a valid ISO 8601 datetime (e.g., 2024-01-15T10:30:00Z)`;
    } else if (issue.code === 'invalid_enum_value') {
      fieldMessage = `${path} must be one of: ${issue.options.join(', ')}`;
    }

    fields[path || 'value'] = fieldMessage;
    messages.push(fieldMessage);
  }

  return {
    message: messages.join('; '),
    fields,
  };
}

function isFastifyError(error: Error): error is FastifyError {
  return 'statusCode' in error && typeof error.statusCode === 'number';
}

export async function errorHandler(error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) {
  // Handle Zod validation errors with meaningful messages
  if (error instanceof ZodError) {
    const { message, fields } = formatZodErrors(error);
    return reply.code(400).send({
      success: false,
      error: 'VALIDATION_ERROR',
      message: `Validation failed: ${message}`,
      fields,
      timestamp: new Date().toISOString(),
    });
  }

  // Fastify's own errors (malformed JSON, unsupported media type...)
  if (isFastifyError(error) && error.statusCode !== undefined && error.statusCode < 500) {
    return reply.code(error.statusCode).send({
      success: false,
      error: error.validation ? 'VALIDATION_ERROR' : error.code,
      message: error.message,
      timestamp: new Date().toISOString(),
    });
  }

  // Service errors carry their code as the message
  const normalized = normalizeError(error, 'An unexpected error occurred. Please try again later.');
  const statusCode = statusCodeFor(normalized.code);

  if (statusCode >= 500) {
    typedLogger.error('Request error', {
      error: error.message,
      stack: error.stack,
      url: request.url,
      method: request.method,
      requestId: request.id,
    });
  } else {
    typedLogger.debug('Request rejected', { code: normalized.code, url: request.url, method: request.method });
  }

  return reply.code(statusCode).send({
    success: false,
    error: statusCode >= 500 ? 'INTERNAL_SERVER_ERROR' : normalized.code,
    message: statusCode >= 500 ? 'An unexpected error occurred. Please try again later.' : normalized.message,
    ...(isDevelopment && statusCode >= 500 ? { stack: error.stack } : {}),
    timestamp: new Date().toISOString(),
  });
}
