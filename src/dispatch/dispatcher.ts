/**
 * Request Dispatcher
 *
 * Serves one request: route lookup, size gate, body decoding, then the
 * endpoint's guard pipelines and its main pipeline, each against a fresh
 * ExecutionContext. Holds no per-request state of its own.
 */

import type { Logger } from 'pino';
import type { CompiledPipeline, DataMap, ExecutionContext, ReplyDirectives } from '../nodes/types.js';
import { createReply, pipelineRunner, type PipelineRunner } from '../nodes/runner.js';
import { MalformedBodyError, NoSuchEndpointError, PayloadSizeViolationError, errorMessage } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import { isPlainObject } from '../utils/object.js';
import type { RouteTable } from './route-table.js';

const logger = createChildLogger({ service: 'dispatcher' });

const VERSIONED_PATH = /^\/*v(\d+)\/(\d+)(?:\/(.*))?$/;

export interface DispatchRequest {
  method: string;
  /** Request target, path plus optional query string */
  url: string;
  headers: Record<string, string | string[] | undefined>;
  /** Raw body; empty when the request carried none */
  body: Buffer;
  /** Bytes received when more arrived than `body` holds; defaults to its length */
  size?: number;
  client: { address: string; port: number };
  /** Transport cancellation, combined with the configured deadline */
  signal?: AbortSignal;
  logger?: Logger;
}

export interface DispatchResponse {
  status: number;
  headers: Record<string, string>;
  body: unknown;
}

export interface DispatcherOptions {
  /** Per-request pipeline deadline */
  requestTimeoutMs?: number;
  runner?: PipelineRunner;
}

export interface VersionedPath {
  major: number;
  minor: number;
  route: string;
}

/**
 * Split `/v<major>/<minor>/<route>` into its parts
 * @returns null when the path carries no version prefix
 */
export function parseVersionedPath(pathname: string): VersionedPath | null {
  const match = VERSIONED_PATH.exec(pathname);
  if (!match) return null;
  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    route: match[3] ?? '',
  };
}

interface DecodedBody {
  /** Fields of a JSON object body, merged into `param` */
  fields: Record<string, unknown>;
  /** Any other body */
  value?: unknown;
}

function isJsonContentType(contentType: string | undefined): boolean {
  if (!contentType) return false;
  const mediaType = contentType.split(';')[0].trim().toLowerCase();
  return mediaType === 'application/json' || mediaType.endsWith('+json');
}

/**
 * Decode a raw body. JSON bodies must parse; anything else is read as UTF-8 text.
 * @throws MalformedBodyError
 */
export function decodeBody(body: Buffer, contentType: string | undefined): DecodedBody {
  if (body.length === 0) {
    return { fields: {} };
  }

  const text = body.toString('utf8');
  if (!isJsonContentType(contentType)) {
    return { fields: {}, value: text };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new MalformedBodyError(errorMessage(error));
  }

  return isPlainObject(parsed) ? { fields: parsed } : { fields: {}, value: parsed };
}

function flattenHeaders(headers: DispatchRequest['headers']): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    flat[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flat;
}

function readQuery(search: URLSearchParams): Record<string, string | string[]> {
  const query: Record<string, string | string[]> = {};
  for (const key of new Set(search.keys())) {
    const values = search.getAll(key);
    query[key] = values.length === 1 ? values[0] : values;
  }
  return query;
}

/**
 * Response for a finished context: the whole of `data`, or the key a node named
 */
export function buildResponse(context: ExecutionContext, reply: ReplyDirectives): DispatchResponse {
  const { bodyKey } = reply;
  const body =
    bodyKey !== undefined && Object.hasOwn(context.data, bodyKey) ? context.data[bodyKey] : context.data;
  return {
    status: reply.status ?? 200,
    headers: { ...reply.headers },
    body,
  };
}

export class RequestDispatcher {
  private readonly runner: PipelineRunner;
  private readonly requestTimeoutMs?: number;

  constructor(
    private readonly table: RouteTable,
    options: DispatcherOptions = {}
  ) {
    this.runner = options.runner ?? pipelineRunner;
    this.requestTimeoutMs = options.requestTimeoutMs;
  }

  get routeCount(): number {
    return this.table.size;
  }

  /**
   * Dispatch one request
   * @throws NoSuchEndpointError | MethodNotAllowedError | PayloadSizeViolationError | MalformedBodyError
   * @throws OperatorError | PipelineTimeoutError
   */
  async dispatch(request: DispatchRequest): Promise<DispatchResponse> {
    const url = new URL(request.url, 'http://localhost');
    const target = parseVersionedPath(url.pathname);
    if (!target) {
      throw new NoSuchEndpointError(url.pathname);
    }

    const { binding, params } = this.table.lookup(target.major, target.minor, target.route, request.method);
    const { endpoint } = binding;

    // Admission: nothing below runs for an out-of-range body
    const size = request.size ?? request.body.length;
    if (size < endpoint.minSize || size > endpoint.maxSize) {
      throw new PayloadSizeViolationError(size, endpoint.minSize, endpoint.maxSize);
    }

    const headers = flattenHeaders(request.headers);
    const decoded = decodeBody(request.body, headers['content-type']);

    const seed: DataMap = {
      headers,
      param: { ...readQuery(url.searchParams), ...decoded.fields, ...params },
      client: [request.client.address, request.client.port],
    };
    if (decoded.value !== undefined) {
      seed.body = decoded.value;
    }

    const log = (request.logger ?? logger).child({ route: binding.route, method: binding.method });
    const signal = this.deadline(request.signal);

    for (const guard of binding.dependencies) {
      const reply = createReply();
      const context = await this.run(guard, seed, signal, log, reply);
      if (reply.status !== undefined && reply.status >= 400) {
        log.info({ dependency: guard.name, status: reply.status }, 'Request rejected by dependency');
        return buildResponse(context, reply);
      }
    }

    const reply = createReply();
    const context = await this.run(binding.pipeline, seed, signal, log, reply);
    return buildResponse(context, reply);
  }

  private run(
    pipeline: CompiledPipeline,
    seed: DataMap,
    signal: AbortSignal | undefined,
    log: Logger,
    reply: ReplyDirectives
  ): Promise<ExecutionContext> {
    // Each pipeline owns its context; nested request values are copied too
    const context: ExecutionContext = { data: structuredClone(seed), state: {} };
    return this.runner.execute(pipeline, context, { signal, logger: log, reply });
  }

  private deadline(transport: AbortSignal | undefined): AbortSignal | undefined {
    const signals: AbortSignal[] = [];
    if (transport) signals.push(transport);
    if (this.requestTimeoutMs !== undefined) signals.push(AbortSignal.timeout(this.requestTimeoutMs));

    if (signals.length === 0) return undefined;
    return signals.length === 1 ? signals[0] : AbortSignal.any(signals);
  }
}
