/**
 * Response Wrappers
 *
 * Responses that own a transport response and add behaviour on top of
 * it. Transport concerns are delegated; subclasses only decide the body.
 */

import { ContentNotRenderedError } from '../errors.ts';
import { withSpanSync } from '../telemetry/otel.ts';
import { decodeContent, HttpResponse } from './response.ts';
import type { ResponseLike, ResponseOptions } from './types.ts';

/**
 * Base for responses composed over an HttpResponse
 */
export abstract class ResponseWrapper implements ResponseLike {
  protected readonly response: HttpResponse;

  protected constructor(response: HttpResponse) {
    this.response = response;
  }

  get statusCode(): number {
    return this.response.statusCode;
  }

  set statusCode(code: number) {
    this.response.statusCode = code;
  }

  get headers(): Headers {
    return this.response.headers;
  }

  get contentType(): string | null {
    return this.response.contentType;
  }

  get content(): Uint8Array {
    return this.response.content;
  }

  text(): string {
    return decodeContent(this.content);
  }

  toResponse(): Response {
    return this.response.toResponse();
  }
}

/**
 * A response whose body is produced after construction.
 *
 * Starts pending. `render()` materialises `renderedContent` into the
 * owned transport response exactly once; later calls are no-ops.
 */
export abstract class DeferredResponse extends ResponseWrapper {
  private _isRendered = false;

  protected constructor(options: ResponseOptions = {}) {
    super(new HttpResponse('', options));
  }

  /**
   * Freshly produced body. Every access renders again.
   */
  abstract get renderedContent(): Uint8Array;

  get isRendered(): boolean {
    return this._isRendered;
  }

  /**
   * Materialise the body if that has not happened yet
   */
  render(): this {
    if (!this._isRendered) {
      this.response.content = withSpanSync(
        'response.render',
        () => this.renderedContent,
        { 'response.type': this.constructor.name },
      );
      this._isRendered = true;
    }
    return this;
  }

  get content(): Uint8Array {
    if (!this._isRendered) {
      throw new ContentNotRenderedError();
    }
    return this.response.content;
  }

  toResponse(): Response {
    return this.render().response.toResponse();
  }
}
