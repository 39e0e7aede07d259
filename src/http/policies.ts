/**
 * Built-in pipeline policies.
 *
 * @module http/policies
 */

import { v4 as uuidv4 } from 'uuid';
import type { PipelinePolicy } from './pipeline.js';
import type { Logger } from '../observability/logger.js';

/** Client identifier sent in User-Agent */
export const SDK_USER_AGENT = 'blobstream-js/0.1.0';

/** Query parameters whose values never reach a log line */
const REDACTED_QUERY_PARAMS = ['sig'];

/** Headers whose values never reach a log line */
const REDACTED_HEADERS = ['authorization', 'x-ms-copy-source-authorization'];

/**
 * Replace the values of sensitive query parameters with `REDACTED`.
 */
export function redactUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }
  for (const name of REDACTED_QUERY_PARAMS) {
    if (parsed.searchParams.has(name)) {
      parsed.searchParams.set(name, 'REDACTED');
    }
  }
  return parsed.toString();
}

function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const sanitized: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    const lower = name.toLowerCase();
    if (REDACTED_HEADERS.includes(lower)) {
      sanitized[name] = 'REDACTED';
    } else if (lower === 'x-ms-copy-source') {
      sanitized[name] = redactUrl(value);
    } else {
      sanitized[name] = value;
    }
  }
  return sanitized;
}

/**
 * Sets the User-Agent header, with an optional application prefix.
 */
export function telemetryPolicy(userAgentPrefix?: string): PipelinePolicy {
  const userAgent = userAgentPrefix ? `${userAgentPrefix} ${SDK_USER_AGENT}` : SDK_USER_AGENT;
  return {
    name: 'telemetry',
    sendRequest(request, next) {
      return next({ ...request, headers: { ...request.headers, 'User-Agent': userAgent } });
    },
  };
}

/**
 * Sets the `x-ms-version` header.
 */
export function serviceVersionPolicy(serviceVersion: string): PipelinePolicy {
  return {
    name: 'serviceVersion',
    sendRequest(request, next) {
      return next({ ...request, headers: { ...request.headers, 'x-ms-version': serviceVersion } });
    },
  };
}

/**
 * Stamps each request with a fresh `x-ms-client-request-id` unless the caller
 * supplied one.
 */
export function requestIdPolicy(): PipelinePolicy {
  return {
    name: 'requestId',
    sendRequest(request, next) {
      if (request.headers['x-ms-client-request-id']) {
        return next(request);
      }
      return next({ ...request, headers: { ...request.headers, 'x-ms-client-request-id': uuidv4() } });
    },
  };
}

/**
 * Logs each request and its outcome. SAS signatures and credentials are
 * redacted.
 */
export function loggingPolicy(logger: Logger): PipelinePolicy {
  return {
    name: 'logging',
    async sendRequest(request, next) {
      const url = redactUrl(request.url);
      const clientRequestId = request.headers['x-ms-client-request-id'];
      logger.debug('Sending request', {
        method: request.method,
        url,
        headers: redactHeaders(request.headers),
      });

      const started = Date.now();
      try {
        const response = await next(request);
        logger.debug('Received response', {
          method: request.method,
          url,
          status: response.statusCode,
          requestId: response.headers.get('x-ms-request-id'),
          clientRequestId,
          durationMs: Date.now() - started,
        });
        return response;
      } catch (error) {
        logger.warn('Request failed', {
          method: request.method,
          url,
          clientRequestId,
          error: error instanceof Error ? error.message : String(error),
          durationMs: Date.now() - started,
        });
        throw error;
      }
    },
  };
}
