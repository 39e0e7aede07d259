/**
 * HTTP core exports
 */

export { HeaderStore, parseHeaderLine } from './headers.js';
export type { HeaderEntry, ReadonlyHeaders } from './headers.js';
export { BodyStream, MemoryBodyStream, IterableBodyStream, concatChunks, READ_CHUNK_SIZE } from './body-stream.js';
export { PushBodyStream, DEFAULT_HIGH_WATER_MARK } from './push-body-stream.js';
export type { PushBodyStreamOptions } from './push-body-stream.js';
export { HttpResponse, statusClassOf, parseStatusLine, parseResponseHead } from './response.js';
export type { StatusClass, StatusLine } from './response.js';
export type { HttpMethod, HttpRequest, HttpTransport } from './types.js';
export { UndiciTransport, mapTransportError } from './undici-transport.js';
export type { UndiciTransportOptions } from './undici-transport.js';
export { HttpPipeline } from './pipeline.js';
export type { PipelinePolicy, SendRequest } from './pipeline.js';
export {
  telemetryPolicy,
  serviceVersionPolicy,
  requestIdPolicy,
  loggingPolicy,
  redactUrl,
  SDK_USER_AGENT,
} from './policies.js';
