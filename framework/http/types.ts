/**
 * HTTP Type Definitions
 */

/**
 * Raw body content: text or UTF-8 bytes
 */
export type Content = string | Uint8Array;

/**
 * Options accepted by every response constructor
 */
export interface ResponseOptions {
  status?: number;
  headers?: Headers | Record<string, string>;
  contentType?: string;
}

/**
 * Anything whose status code can be rewritten after it is built
 */
export interface StatusCarrier {
  statusCode: number;
}

/**
 * Common surface of buffered responses
 */
export interface ResponseLike extends StatusCarrier {
  readonly headers: Headers;
  readonly contentType: string | null;
  readonly content: Uint8Array;
  text(): string;
  toResponse(): Response;
}

export const HttpStatus = {
  OK: 200,
  FOUND: 302,
  SEE_OTHER: 303,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
} as const;

export type RedirectStatus = 301 | 302 | 303 | 307 | 308;
