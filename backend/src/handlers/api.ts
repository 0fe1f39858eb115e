import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2 } from 'aws-lambda';
import { ZodError } from 'zod';
import { ErrorCode, type Envelope, type ErrorEnvelope, type HealthResponse } from '@tickwatch/shared';
import { config } from '../lib/config.js';
import { Deadline } from '../lib/deadline.js';
import { AppError } from '../lib/errors.js';
import { createRequestLogger, type Logger } from '../lib/logger.js';
import { DynamoSightingRepository } from '../lib/repositories/dynamo.js';
import type { SightingRepository } from '../lib/repositories/types.js';
import { createAnalyticsSettings, type AnalyticsSettings } from '../lib/settings.js';

// Services
import * as sightingService from '../lib/services/sightings.js';
import * as statisticsService from '../lib/services/statistics.js';
import * as forecastService from '../lib/services/forecast.js';
import * as riskService from '../lib/services/risk.js';

// Validation schemas
import {
  filterQuerySchema,
  predictionQuerySchema,
  riskQuerySchema,
  sightingIdSchema,
} from '../lib/validation.js';

export const NO_RESULTS_MESSAGE = 'No results found for the given filters.';

export interface ApiDeps {
  repository: SightingRepository;
  settings: AnalyticsSettings;
  now?: () => Date;
}

// Route handler type
type RouteHandler = (event: APIGatewayProxyEventV2, context: HandlerContext) => Promise<APIGatewayProxyResultV2>;

interface HandlerContext {
  requestId: string;
  logger: Logger;
  deps: ApiDeps;
  deadline: Deadline;
  params: Record<string, string>;
}

export type ApiHandler = (event: APIGatewayProxyEventV2) => Promise<APIGatewayProxyResultV2>;

// Parse query parameters
function getQueryParams(event: APIGatewayProxyEventV2): Record<string, string> {
  const params = event.queryStringParameters || {};
  // Filter out undefined values
  return Object.fromEntries(
    Object.entries(params).filter((entry): entry is [string, string] => entry[1] !== undefined)
  );
}

// Create JSON response
function jsonResponse(statusCode: number, body: unknown, headers?: Record<string, string>): APIGatewayProxyResultV2 {
  return {
    statusCode,
    headers: {
      'Content-Type': 'application/json',
      ...headers,
    },
    body: JSON.stringify(body),
  };
}

function success<T>(data: T, results: number, message?: string): APIGatewayProxyResultV2 {
  const envelope: Envelope<T> = {
    status: 'success',
    ...(message && { message }),
    results,
    data,
  };
  return jsonResponse(200, envelope);
}

function failure(statusCode: number, code: ErrorCode, message: string, requestId: string, details?: Record<string, unknown>) {
  const envelope: ErrorEnvelope = {
    status: 'error',
    message,
    results: 0,
    data: { code, requestId, ...(details && { details }) },
  };
  return jsonResponse(statusCode, envelope);
}

// Route definitions
const routes: Record<string, RouteHandler> = {
  'GET /': async () =>
    jsonResponse(200, {
      message: 'Tick sightings API',
      version: config.version,
      endpoints: ['/api/sightings/', '/api/statistics/', '/api/predictions/', '/api/riskfactor/'],
    }),

  'GET /health': async () => {
    const response: HealthResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: config.version,
    };
    return jsonResponse(200, response);
  },

  'GET /api/sightings': async (event, ctx) => {
    const criteria = filterQuerySchema.parse(getQueryParams(event));
    const { items, total } = await sightingService.findSightings(ctx.deps.repository, criteria, {
      species: ctx.deps.settings.species,
      deadline: ctx.deadline,
    });
    return success(items, total, total === 0 ? NO_RESULTS_MESSAGE : undefined);
  },

  'GET /api/sightings/{id}': async (_event, ctx) => {
    const id = sightingIdSchema.parse(ctx.params.id);
    const sighting = await sightingService.getSighting(ctx.deps.repository, id);
    return success(sighting, 1);
  },

  'GET /api/statistics': async (event, ctx) => {
    const criteria = filterQuerySchema.parse(getQueryParams(event));
    const summary = await statisticsService.getStatistics(ctx.deps.repository, criteria, {
      species: ctx.deps.settings.species,
      deadline: ctx.deadline,
      now: ctx.deps.now?.(),
    });
    return summary.totalSightings === 0 ? success(summary, 0, NO_RESULTS_MESSAGE) : success(summary, 1);
  },

  'GET /api/predictions': async (event, ctx) => {
    const { criteria, horizon, granularity } = predictionQuerySchema.parse(getQueryParams(event));
    const result = await forecastService.getForecast(
      ctx.deps.repository,
      criteria,
      { horizon, granularity },
      { species: ctx.deps.settings.species, deadline: ctx.deadline }
    );
    return success(result, 1);
  },

  'GET /api/riskfactor': async (event, ctx) => {
    const profile = riskQuerySchema.parse(getQueryParams(event));
    return success(riskService.scoreRisk(profile, ctx.deps.settings.riskWeights), 1);
  },
};

// Trailing slashes are optional on every route
function normalizePath(path: string): string {
  const trimmed = path.replace(/\/+$/, '');
  return trimmed === '' ? '/' : trimmed;
}

// Match route to handler
export function matchRoute(
  method: string,
  path: string
): { handler: RouteHandler; params: Record<string, string> } | null {
  const direct = routes[`${method} ${path}`];
  if (direct) {
    return { handler: direct, params: {} };
  }

  // Pattern matching with path parameters
  const pathParts = path.split('/');
  for (const [pattern, handler] of Object.entries(routes)) {
    const [patternMethod, patternPath = ''] = pattern.split(' ');
    if (patternMethod !== method) continue;

    const patternParts = patternPath.split('/');
    if (patternParts.length !== pathParts.length) continue;

    const params: Record<string, string> = {};
    const matches = patternParts.every((part, i) => {
      const actual = pathParts[i] ?? '';
      if (part.startsWith('{') && part.endsWith('}')) {
        params[part.slice(1, -1)] = decodeURIComponent(actual);
        return actual !== '';
      }
      return part === actual;
    });

    if (matches) {
      return { handler, params };
    }
  }

  return null;
}

function errorResponse(error: unknown, requestId: string, logger: Logger): APIGatewayProxyResultV2 {
  // Handle known errors
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      logger.error({ error, cause: error.cause, code: error.code }, 'Application error');
    } else {
      logger.warn({ error: error.message, code: error.code }, 'Application error');
    }
    return jsonResponse(error.statusCode, error.toEnvelope(requestId));
  }

  // Handle Zod validation errors
  if (error instanceof ZodError) {
    logger.warn({ issues: error.issues }, 'Validation error');
    const message = [...new Set(error.issues.map((issue) => issue.message))].join('; ');
    return failure(400, ErrorCode.VALIDATION_ERROR, message || 'Validation failed', requestId, {
      issues: error.issues,
    });
  }

  // Unknown errors
  logger.error({ error }, 'Unexpected error');
  return failure(500, ErrorCode.INTERNAL_ERROR, 'An unexpected error occurred', requestId);
}

/**
 * Build the Lambda handler around explicit dependencies. `deps` may be a
 * factory, called once on the first request.
 */
export function createHandler(deps: ApiDeps | (() => ApiDeps)): ApiHandler {
  let resolved: ApiDeps | undefined = typeof deps === 'function' ? undefined : deps;

  return async (event) => {
    const requestId = event.requestContext.requestId;
    const logger = createRequestLogger(requestId);
    const method = event.requestContext.http.method;
    const path = normalizePath(event.rawPath);

    logger.info({ method, path }, 'Request received');

    try {
      if (!resolved && typeof deps === 'function') {
        resolved = deps();
      }
      if (!resolved) {
        throw new Error('Handler dependencies are not available');
      }

      // Match route
      const match = matchRoute(method, path);
      if (!match) {
        return failure(404, ErrorCode.NOT_FOUND, `Route not found: ${method} ${path}`, requestId);
      }

      const response = await match.handler(event, {
        requestId,
        logger,
        deps: resolved,
        deadline: new Deadline(resolved.settings.computeBudgetMs),
        params: match.params,
      });

      const statusCode = typeof response === 'object' ? response.statusCode : undefined;
      logger.info({ statusCode }, 'Request completed');
      return response;
    } catch (error) {
      return errorResponse(error, requestId, logger);
    }
  };
}

// Lambda entry point; storage and settings are built on first use
export const handler = createHandler(() => ({
  repository: new DynamoSightingRepository(),
  settings: createAnalyticsSettings(),
}));
