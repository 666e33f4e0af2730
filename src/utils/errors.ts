/**
 * Base application error
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, code: string, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * 400 Bad Request
 */
export class BadRequestError extends AppError {
  constructor(message = 'Bad request', code = 'BAD_REQUEST') {
    super(message, 400, code);
  }
}

/**
 * 404 Not Found
 */
export class NotFoundError extends AppError {
  constructor(message = 'Not found', code = 'NOT_FOUND') {
    super(message, 404, code);
  }
}

/**
 * 422 Unprocessable Entity
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message = 'Validation failed', details?: unknown) {
    super(message, 422, 'VALIDATION_ERROR');
    this.details = details;
  }
}

/**
 * 500 Internal Server Error
 */
export class InternalError extends AppError {
  constructor(message = 'Internal server error', code = 'INTERNAL_ERROR') {
    super(message, 500, code, false);
  }
}

// ── Compile-time (fatal at startup) ──────────────────────

/**
 * Malformed pipeline, endpoint or registry declaration.
 * Never reaches a caller: startup aborts before the server listens.
 */
export class PipelineConfigError extends AppError {
  constructor(message: string, code: string) {
    super(message, 500, code, false);
  }
}

export class DuplicateNodeNameError extends PipelineConfigError {
  public readonly pipeline: string;
  public readonly nodeName: string;

  constructor(pipeline: string, nodeName: string) {
    super(`Pipeline '${pipeline}' declares node '${nodeName}' more than once`, 'DUPLICATE_NODE_NAME');
    this.pipeline = pipeline;
    this.nodeName = nodeName;
  }
}

export class DanglingEdgeError extends PipelineConfigError {
  public readonly pipeline: string;
  public readonly edge: readonly [string, string];

  constructor(pipeline: string, edge: readonly [string, string], missing: string) {
    super(
      `Pipeline '${pipeline}' edge '${edge[0]} -> ${edge[1]}' references undeclared node '${missing}'`,
      'DANGLING_EDGE'
    );
    this.pipeline = pipeline;
    this.edge = edge;
  }
}

export class CyclicPipelineError extends PipelineConfigError {
  public readonly pipeline: string;
  public readonly unresolved: readonly string[];

  constructor(pipeline: string, unresolved: readonly string[]) {
    super(
      `Pipeline '${pipeline}' contains a cycle through [${unresolved.join(', ')}]`,
      'CYCLIC_PIPELINE'
    );
    this.pipeline = pipeline;
    this.unresolved = unresolved;
  }
}

export class EmptyPipelineError extends PipelineConfigError {
  constructor(pipeline: string) {
    super(`Pipeline '${pipeline}' declares no nodes`, 'EMPTY_PIPELINE');
  }
}

export class UnknownNodeTypeError extends PipelineConfigError {
  public readonly type: string;
  public readonly version: string;

  constructor(type: string, version: string, nodeName?: string) {
    const where = nodeName ? ` (node '${nodeName}')` : '';
    super(`Unknown node type '${type}@${version}'${where}`, 'UNKNOWN_NODE_TYPE');
    this.type = type;
    this.version = version;
  }
}

export class InvalidLastNodeError extends PipelineConfigError {
  public readonly pipeline: string;
  public readonly nodeName: string;

  constructor(pipeline: string, nodeName: string, reason: string) {
    super(`Pipeline '${pipeline}' cannot end at node '${nodeName}': ${reason}`, 'INVALID_LAST_NODE');
    this.pipeline = pipeline;
    this.nodeName = nodeName;
  }
}

export class InvalidNodeConfigError extends PipelineConfigError {
  public readonly nodeName: string;
  public readonly details: unknown;

  constructor(nodeName: string, reason: string, details?: unknown) {
    super(`Invalid config for node '${nodeName}': ${reason}`, 'INVALID_NODE_CONFIG');
    this.nodeName = nodeName;
    this.details = details;
  }
}

export class DuplicateNodeTypeError extends PipelineConfigError {
  constructor(type: string, version: string) {
    super(`Node type '${type}@${version}' is already registered`, 'DUPLICATE_NODE_TYPE');
  }
}

export class RegistryFrozenError extends PipelineConfigError {
  constructor(type: string, version: string) {
    super(
      `Cannot register '${type}@${version}': node type registry is frozen`,
      'REGISTRY_FROZEN'
    );
  }
}

export class InvalidExtensionError extends PipelineConfigError {
  constructor(specifier: string, reason: string) {
    super(`Extension '${specifier}' could not be loaded: ${reason}`, 'INVALID_EXTENSION');
  }
}

export class DuplicatePipelineNameError extends PipelineConfigError {
  constructor(name: string) {
    super(`Pipeline name '${name}' is declared more than once`, 'DUPLICATE_PIPELINE_NAME');
  }
}

export class UnknownDependencyError extends PipelineConfigError {
  constructor(route: string, dependency: string) {
    super(`Endpoint '${route}' depends on undeclared dependency '${dependency}'`, 'UNKNOWN_DEPENDENCY');
  }
}

export class DuplicateRouteError extends PipelineConfigError {
  public readonly route: string;
  public readonly method: string;

  constructor(route: string, method: string) {
    super(`Route '${method} ${route}' is declared more than once`, 'DUPLICATE_ROUTE');
    this.route = route;
    this.method = method;
  }
}

// ── Request-time admission ───────────────────────────────

export class NoSuchEndpointError extends NotFoundError {
  constructor(path: string) {
    super(`No endpoint matches '${path}'`, 'NO_SUCH_ENDPOINT');
  }
}

/**
 * 405 Method Not Allowed
 */
export class MethodNotAllowedError extends AppError {
  public readonly allowed: readonly string[];

  constructor(method: string, path: string, allowed: readonly string[]) {
    super(`Method ${method} is not allowed on '${path}'`, 405, 'METHOD_NOT_ALLOWED');
    this.allowed = allowed;
  }
}

/**
 * Body length outside the endpoint's declared bounds.
 * 413 above max_size, 400 below min_size.
 */
export class PayloadSizeViolationError extends AppError {
  public readonly size: number;

  constructor(size: number, minSize: number, maxSize: number) {
    const tooLarge = size > maxSize;
    super(
      `Payload of ${size} bytes is outside the accepted range [${minSize}, ${maxSize}]`,
      tooLarge ? 413 : 400,
      'PAYLOAD_SIZE_VIOLATION'
    );
    this.size = size;
  }
}

export class MalformedBodyError extends BadRequestError {
  constructor(reason: string) {
    super(`Request body is not valid JSON: ${reason}`, 'MALFORMED_BODY');
  }
}

// ── Execution-time ───────────────────────────────────────

/**
 * A node capability failed during a pipeline walk.
 * The message is for logs only; callers receive the errorId.
 */
export class OperatorError extends AppError {
  public readonly errorId: string;
  public readonly pipeline: string;
  public readonly nodeName: string;
  public readonly nodeType: string;
  public readonly originalError?: Error;

  constructor(params: {
    errorId: string;
    pipeline: string;
    nodeName: string;
    nodeType: string;
    reason: string;
    originalError?: Error;
  }) {
    super(
      `Node '${params.nodeName}' (${params.nodeType}) in pipeline '${params.pipeline}' failed: ${params.reason}`,
      500,
      'PIPELINE_FAILED'
    );
    this.errorId = params.errorId;
    this.pipeline = params.pipeline;
    this.nodeName = params.nodeName;
    this.nodeType = params.nodeType;
    this.originalError = params.originalError;
  }
}

/**
 * 504 - the request deadline passed before the walk finished
 */
export class PipelineTimeoutError extends AppError {
  public readonly pipeline: string;

  public readonly nodeName: string;

  constructor(pipeline: string, nodeName: string) {
    super(`Pipeline '${pipeline}' abandoned at node '${nodeName}': request deadline exceeded`, 504, 'PIPELINE_TIMEOUT');
    this.pipeline = pipeline;
    this.nodeName = nodeName;
  }
}

/**
 * Extract a message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
