/**
 * Request pipeline.
 *
 * Policies wrap the transport in order: the first policy sees the request
 * first and the response last.
 *
 * @module http/pipeline
 */

import type { HttpRequest, HttpTransport } from './types.js';
import type { HttpResponse } from './response.js';

/**
 * Next step in the chain
 */
export type SendRequest = (request: HttpRequest) => Promise<HttpResponse>;

/**
 * Pipeline policy interface.
 *
 * A policy may change the request before calling `next`, and inspect the
 * response (or failure) afterwards.
 */
export interface PipelinePolicy {
  readonly name: string;
  sendRequest(request: HttpRequest, next: SendRequest): Promise<HttpResponse>;
}

/**
 * Ordered chain of policies in front of a transport.
 */
export class HttpPipeline {
  private readonly transport: HttpTransport;
  private readonly policies: readonly PipelinePolicy[];

  constructor(transport: HttpTransport, policies: readonly PipelinePolicy[] = []) {
    this.transport = transport;
    this.policies = [...policies];
  }

  /** Names of the installed policies, outermost first */
  get policyNames(): string[] {
    return this.policies.map((policy) => policy.name);
  }

  send(request: HttpRequest): Promise<HttpResponse> {
    const dispatch = (index: number, current: HttpRequest): Promise<HttpResponse> => {
      const policy = this.policies[index];
      if (!policy) {
        return this.transport.send(current);
      }
      return policy.sendRequest(current, (next) => dispatch(index + 1, next));
    };
    return dispatch(0, request);
  }

  close(): Promise<void> {
    return this.transport.close();
  }
}
