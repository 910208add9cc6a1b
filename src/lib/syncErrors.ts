import axios from 'axios';
import { z, ZodError } from 'zod';

export type ApiFailureKind = 'network' | 'authentication' | 'validation' | 'server' | 'malformed' | 'request';

export abstract class PurchaseApiError extends Error {
  abstract readonly kind: ApiFailureKind;

  constructor(
    message: string,
    public readonly statusCode: number | null
  ) {
    super(message);
  }
}

/** Timeout, DNS/TLS failure, refused connection: no HTTP response at all. */
export class NetworkFailure extends PurchaseApiError {
  readonly kind = 'network';

  constructor(
    message: string,
    public readonly code: string | null = null
  ) {
    super(message, null);
    this.name = 'NetworkFailure';
  }
}

export class AuthenticationFailure extends PurchaseApiError {
  readonly kind = 'authentication';

  constructor(message = 'Session expired, sign in again') {
    super(message, 401);
    this.name = 'AuthenticationFailure';
  }
}

export class ValidationFailure extends PurchaseApiError {
  readonly kind = 'validation';

  constructor(
    message: string,
    public readonly fields: Record<string, string[]>
  ) {
    super(message, 422);
    this.name = 'ValidationFailure';
  }
}

export class ServerFailure extends PurchaseApiError {
  readonly kind = 'server';

  constructor(message: string, statusCode: number) {
    super(message, statusCode);
    this.name = 'ServerFailure';
  }
}

export class MalformedResponse extends PurchaseApiError {
  readonly kind = 'malformed';

  constructor(message: string, statusCode: number | null = null) {
    super(message, statusCode);
    this.name = 'MalformedResponse';
  }
}

/** Any other 4xx (403, 404, 409...). */
export class RequestFailure extends PurchaseApiError {
  readonly kind = 'request';

  constructor(message: string, statusCode: number) {
    super(message, statusCode);
    this.name = 'RequestFailure';
  }
}

const FieldErrors = z.record(z.union([z.array(z.string()), z.string()])).transform((errors) => {
  const fields: Record<string, string[]> = {};
  for (const [field, messages] of Object.entries(errors)) {
    fields[field] = Array.isArray(messages) ? messages : [messages];
  }
  return fields;
});

const ErrorBody = z
  .object({
    message: z.string().optional(),
    msg: z.string().optional(),
    error: z.union([z.string(), z.object({ message: z.string().optional() }).passthrough()]).optional(),
    errors: FieldErrors.optional(),
  })
  .passthrough();

function readErrorBody(data: unknown): z.output<typeof ErrorBody> | null {
  const parsed = ErrorBody.safeParse(data);
  return parsed.success ? parsed.data : null;
}

function messageFrom(body: z.output<typeof ErrorBody> | null, fallback: string): string {
  if (!body) return fallback;
  if (body.message) return body.message;
  if (body.msg) return body.msg;
  if (typeof body.error === 'string') return body.error;
  return body.error?.message ?? fallback;
}

const NETWORK_CODES_TIMEOUT = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Maps whatever a remote call threw onto the PurchaseApiError taxonomy.
 * Errors that are not transport or HTTP errors are returned as null so the
 * caller can treat them as programming or storage faults.
 */
export function classifyApiError(error: unknown): PurchaseApiError | null {
  if (error instanceof PurchaseApiError) return error;

  if (error instanceof ZodError) {
    return new MalformedResponse(`Unexpected response shape: ${error.issues[0]?.message ?? 'invalid'}`);
  }

  if (!axios.isAxiosError(error)) return null;

  const response = error.response;
  if (!response) {
    const code = error.code ?? null;
    const message =
      code && NETWORK_CODES_TIMEOUT.has(code)
        ? 'Request timed out'
        : error.message || 'Network request failed';
    return new NetworkFailure(message, code);
  }

  const status = response.status;
  const body = readErrorBody(response.data);

  if (status === 401) {
    return new AuthenticationFailure(messageFrom(body, 'Session expired, sign in again'));
  }
  if (status === 422) {
    return new ValidationFailure(messageFrom(body, 'Validation failed'), body?.errors ?? {});
  }
  if (status >= 500) {
    return new ServerFailure(messageFrom(body, `Server error (${status})`), status);
  }
  if (status === 403) {
    return new RequestFailure(messageFrom(body, 'Not allowed to perform this action'), status);
  }
  if (status === 404) {
    return new RequestFailure(messageFrom(body, 'Resource not found'), status);
  }
  return new RequestFailure(messageFrom(body, `Request failed (${status})`), status);
}

export function isPurchaseApiError(error: unknown): error is PurchaseApiError {
  return error instanceof PurchaseApiError;
}
