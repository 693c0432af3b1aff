/**
 * Transport Response
 *
 * Mutable response object handed to the transport layer. Holds the
 * status code, headers and a UTF-8 byte body, and converts to a native
 * Response once the handler is done with it.
 */

import type { Content, RedirectStatus, ResponseLike, ResponseOptions } from './types.ts';
import { HttpStatus } from './types.ts';

export const DEFAULT_CONTENT_TYPE = 'text/html; charset=utf-8';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Encode content as UTF-8 bytes
 */
export function encodeContent(content: Content): Uint8Array {
  return typeof content === 'string' ? encoder.encode(content) : content;
}

/**
 * Decode content as UTF-8 text
 */
export function decodeContent(content: Content): string {
  return typeof content === 'string' ? content : decoder.decode(content);
}

/**
 * Join byte chunks in order without re-encoding them
 */
export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  const result = new Uint8Array(chunks.reduce((total, chunk) => total + chunk.byteLength, 0));
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return result;
}

/**
 * Buffered HTTP response
 */
export class HttpResponse implements ResponseLike {
  statusCode: number;
  private _headers: Headers;
  private _content: Uint8Array;

  constructor(content: Content = '', options: ResponseOptions = {}) {
    this.statusCode = options.status ?? HttpStatus.OK;
    this._headers = new Headers(options.headers);
    if (options.contentType) {
      this._headers.set('Content-Type', options.contentType);
    } else if (!this._headers.has('Content-Type')) {
      this._headers.set('Content-Type', DEFAULT_CONTENT_TYPE);
    }
    this._content = encodeContent(content);
  }

  /**
   * Create a redirect response
   */
  static redirect(url: string, status: RedirectStatus = HttpStatus.FOUND): HttpResponse {
    return new HttpResponse('', { status, headers: { Location: url } });
  }

  get headers(): Headers {
    return this._headers;
  }

  get contentType(): string | null {
    return this._headers.get('Content-Type');
  }

  get content(): Uint8Array {
    return this._content;
  }

  set content(value: Content) {
    this._content = encodeContent(value);
  }

  /**
   * Set the response status code
   */
  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  /**
   * Set a response header
   */
  header(name: string, value: string): this {
    this._headers.set(name, value);
    return this;
  }

  /**
   * Set the Content-Type header
   */
  type(contentType: string): this {
    this._headers.set('Content-Type', contentType);
    return this;
  }

  /**
   * Body decoded as text
   */
  text(): string {
    return decodeContent(this._content);
  }

  /**
   * Build the native Response for the transport
   */
  toResponse(): Response {
    return new Response(this._content.slice(), {
      status: this.statusCode,
      headers: new Headers(this._headers),
    });
  }
}
