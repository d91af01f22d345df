import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiProduces, ApiResponse } from '@nestjs/swagger';

/**
 * Swagger decorator for the liveness probe
 */
export const ApiLivenessCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Liveness probe',
      description: 'Returns 200 while the process is serving requests',
    }),
    ApiResponse({
      status: 200,
      description: 'Process is alive',
      schema: {
        type: 'object',
        properties: {
          status: { type: 'string', example: 'ok' },
        },
      },
    }),
  );
};

/**
 * Swagger decorator for the readiness probe
 */
export const ApiReadinessCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Readiness probe',
      description:
        'Ready when a signing secret is configured and the message store answers',
    }),
    ApiResponse({
      status: 200,
      description: 'Service can accept webhooks',
      schema: {
        type: 'object',
        properties: {
          status: { type: 'string', example: 'ready' },
        },
      },
    }),
    ApiResponse({
      status: 503,
      description: 'Secret missing or store unreachable',
      schema: {
        type: 'object',
        properties: {
          detail: { type: 'string', example: 'storage unavailable' },
        },
      },
    }),
  );
};

/**
 * Swagger decorator for the Prometheus scrape endpoint
 */
export const ApiMetricsExposition = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Prometheus metrics',
      description: 'Counters and latency histogram in text exposition format',
    }),
    ApiProduces('text/plain'),
    ApiResponse({ status: 200, description: 'Metrics exposition' }),
  );
};
