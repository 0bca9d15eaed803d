/**
 * Gateway error taxonomy.
 *
 * Every failure a request can end in maps to one of these classes. Each carries a
 * stable `kind` (surfaced to clients as the error `type`) and the HTTP status used
 * when the failure is answered with a plain JSON body.
 *
 * @packageDocumentation
 */

export type GatewayErrorKind =
  | 'unauthorized'
  | 'invalid_request'
  | 'unknown_model'
  | 'upstream_timeout'
  | 'upstream_error'
  | 'stream_truncated'
  | 'client_disconnected'
  | 'internal_error';

/**
 * Error response format (OpenAI-compatible)
 */
export interface ErrorBody {
  error: {
    message: string;
    type: GatewayErrorKind;
    code: string;
  };
}

export abstract class GatewayError extends Error {
  abstract readonly kind: GatewayErrorKind;
  abstract readonly status: number;

  constructor(
    message: string,
    readonly code: string,
  ) {
    super(message);
    this.name = new.target.name;
  }

  toBody(): ErrorBody {
    return {
      error: {
        message: this.message,
        type: this.kind,
        code: this.code,
      },
    };
  }
}

export class Unauthorized extends GatewayError {
  readonly kind = 'unauthorized';
  readonly status = 401;

  constructor(message = 'Invalid API key') {
    super(message, 'invalid_api_key');
  }
}

export class InvalidRequest extends GatewayError {
  readonly kind = 'invalid_request';
  readonly status: number;

  constructor(message: string, status = 400) {
    super(message, status === 413 ? 'body_too_large' : 'invalid_body');
    this.status = status;
  }
}

export class UnknownModel extends GatewayError {
  readonly kind = 'unknown_model';
  readonly status = 404;

  constructor(readonly model: string) {
    super(`Model '${model}' not found`, 'model_not_found');
  }
}

export class UpstreamTimeout extends GatewayError {
  readonly kind = 'upstream_timeout';
  readonly status = 503;

  constructor(message: string) {
    super(message, 'backend_unavailable');
  }
}

export class UpstreamError extends GatewayError {
  readonly kind = 'upstream_error';
  readonly status = 502;

  /**
   * @param upstreamStatus - status the backend answered with (200 for errors reported in-band)
   * @param upstreamBody - raw backend body, for logs only
   */
  constructor(
    message: string,
    readonly upstreamStatus: number,
    readonly upstreamBody: string,
  ) {
    super(message, 'backend_error');
  }
}

export class StreamTruncated extends GatewayError {
  readonly kind = 'stream_truncated';
  readonly status = 502;

  constructor(message = 'Backend stream ended before completion') {
    super(message, 'stream_truncated');
  }
}

export class ClientDisconnected extends GatewayError {
  readonly kind = 'client_disconnected';
  // nginx's "client closed request"; never written to a socket
  readonly status = 499;

  constructor() {
    super('Client closed the connection', 'client_disconnected');
  }
}

export class InternalError extends GatewayError {
  readonly kind = 'internal_error';
  readonly status = 500;

  constructor(message = 'Internal server error') {
    super(message, 'server_error');
  }
}

/**
 * Normalize anything thrown inside a request into a GatewayError.
 */
export function toGatewayError(err: unknown): GatewayError {
  if (err instanceof GatewayError) return err;
  return new InternalError();
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
