export type CapabilityErrorCode = 'http_error' | 'unexpected_response';

export type CapabilityErrorMetadata = Record<string, unknown> & {
  capability?: string;
  resource?: string;
  name?: string;
};

export class CapabilityRequestError extends Error {
  readonly status: number;
  readonly url: string;
  readonly method: string;
  readonly responseBody?: string;
  readonly code: CapabilityErrorCode;
  readonly metadata?: CapabilityErrorMetadata;

  constructor(options: {
    method: string;
    url: string;
    status: number;
    body?: string;
    message?: string;
    code?: CapabilityErrorCode;
    metadata?: CapabilityErrorMetadata;
  }) {
    const baseMessage =
      options.message ?? `Request to ${options.method.toUpperCase()} ${options.url} failed with status ${options.status}`;
    super(baseMessage);
    this.name = 'CapabilityRequestError';
    this.status = options.status;
    this.url = options.url;
    this.method = options.method.toUpperCase();
    this.responseBody = options.body;
    this.code = options.code ?? 'http_error';
    this.metadata = options.metadata;
  }

  /**
   * A 2xx response whose payload lacks what the caller needs, e.g. a create
   * call answered without an `id`.
   */
  static unexpectedResponse(options: {
    method: string;
    url: string;
    status: number;
    message: string;
    metadata?: CapabilityErrorMetadata;
  }): CapabilityRequestError {
    return new CapabilityRequestError({ ...options, code: 'unexpected_response' });
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
