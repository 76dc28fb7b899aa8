/**
 * Collaborator Ports
 *
 * Interfaces of the two external collaborators: the interception engine that
 * owns connections and calls the per-exchange hooks, and the Thrift decoder.
 *
 * @module @fault-proxy/server/faults/ports
 */

import type { DecodeError, DecodedThriftMessage } from '@fault-proxy/shared';

/**
 * Request as seen by the hooks
 */
export interface InterceptedRequest {
  method: string;
  /** Host header value (may carry a port) */
  host: string;
  /** Path including the query string */
  path: string;
  /** Full URL, for records and logs */
  url: string;
  /** Request body, empty when none */
  body: Uint8Array;
}

/**
 * Upstream response as seen by the response hook
 */
export interface InterceptedResponse {
  statusCode: number;
  body: Uint8Array;
}

/**
 * Response synthesized by the proxy instead of contacting upstream
 */
export interface SyntheticResponse {
  statusCode: number;
  body: string;
  headers: Record<string, string>;
}

/**
 * One request/response exchange plus the mutation primitives the engine offers
 */
export interface ExchangeFlow {
  readonly request: InterceptedRequest;
  /** Set once upstream has answered */
  readonly response: InterceptedResponse | null;
  /** Answer the client with `response` without contacting upstream */
  respond(response: SyntheticResponse): void;
  /** Forcibly terminate the client connection */
  kill(): void;
  /** Undo `respond`/`kill` so the request proceeds upstream unmodified */
  revert(): void;
}

/**
 * Hooks the engine calls for every exchange
 */
export interface ExchangeHooks {
  /** Before forwarding; the engine waits for the returned promise */
  request(flow: ExchangeFlow): Promise<void>;
  /** After the upstream response has been received */
  response(flow: ExchangeFlow): void;
}

/**
 * Interception engine driving the data plane
 */
export interface InterceptionEngine {
  start(hooks: ExchangeHooks): Promise<void>;
  stop(): Promise<void>;
}

export type DecodeResult =
  | { ok: true; message: DecodedThriftMessage }
  | { ok: false; error: DecodeError };

/**
 * Thrift wire-format decoder
 */
export interface ThriftDecoder {
  decode(payload: Uint8Array): DecodeResult;
  /** Human-readable rendering for logs */
  format(message: DecodedThriftMessage): string;
}
