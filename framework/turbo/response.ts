/**
 * Turbo Responses
 *
 * Responses whose bodies are wrapped in turbo-stream or turbo-frame
 * markup. Each owns a transport response and only decides the body.
 *
 * Eager variants wrap their content once, at construction. Template
 * variants overlay the Turbo keys onto the template context and wrap
 * the rendered template when the body is materialised.
 */

import type { HttpRequest } from '../http/request.ts';
import { encodeContent, HttpResponse } from '../http/response.ts';
import type { Content, ResponseOptions } from '../http/types.ts';
import { DeferredResponse, ResponseWrapper } from '../http/wrapper.ts';
import type { TemplateContext, TemplateRenderer } from '../view/template.ts';
import { TemplateResponse } from '../view/template_response.ts';
import { renderTurboFrame, renderTurboStream, type Action } from './renderers.ts';

export const TURBO_STREAM_CONTENT_TYPE = 'text/html; turbo-stream; charset=utf-8';

type TransportOptions = Omit<ResponseOptions, 'contentType'>;

export interface TurboStreamResponseOptions extends TransportOptions {
  action: Action;
  target: string;
  content?: Content;
}

export interface TurboFrameResponseOptions extends ResponseOptions {
  domId: string;
  content?: Content;
}

interface TemplateOptions extends TransportOptions {
  request: HttpRequest;
  template: string | readonly string[];
  context?: TemplateContext;
  engine: TemplateRenderer;
}

export interface TurboStreamTemplateResponseOptions extends TemplateOptions {
  action: Action;
  target: string;
}

export interface TurboFrameTemplateResponseOptions extends TemplateOptions {
  domId: string;
}

export interface TurboStreamStreamingResponseOptions extends TransportOptions {
  streamingContent: Iterable<Content> | AsyncIterable<Content>;
}

export class TurboStreamResponse extends ResponseWrapper {
  readonly isTurboStream = true;
  readonly action: Action;
  readonly target: string;

  constructor({ action, target, content = '', status, headers }: TurboStreamResponseOptions) {
    super(
      new HttpResponse(renderTurboStream(action, target, content), {
        status,
        headers,
        contentType: TURBO_STREAM_CONTENT_TYPE,
      })
    );
    this.action = action;
    this.target = target;
  }
}

export class TurboFrameResponse extends ResponseWrapper {
  readonly isTurboFrame = true;
  readonly domId: string;

  constructor({ domId, content = '', ...options }: TurboFrameResponseOptions) {
    super(new HttpResponse(renderTurboFrame(domId, content), options));
    this.domId = domId;
  }
}

export class TurboStreamTemplateResponse extends DeferredResponse {
  readonly isTurboStream = true;
  readonly action: Action;
  readonly target: string;
  private readonly template: TemplateResponse;

  constructor({ action, target, context = {}, status, headers, ...templateOptions }: TurboStreamTemplateResponseOptions) {
    super({ status, headers, contentType: TURBO_STREAM_CONTENT_TYPE });
    this.action = action;
    this.target = target;
    this.template = new TemplateResponse({
      ...templateOptions,
      context: {
        ...context,
        turbo_stream_action: action,
        turbo_stream_target: target,
        is_turbo_stream: true,
      },
    });
  }

  get templateNames(): readonly string[] {
    return this.template.templateNames;
  }

  /**
   * Context handed to the template, Turbo keys included
   */
  get contextData(): Readonly<TemplateContext> {
    return this.template.contextData;
  }

  get renderedContent(): Uint8Array {
    return renderTurboStream(this.action, this.target, this.template.renderedContent);
  }
}

export class TurboFrameTemplateResponse extends DeferredResponse {
  readonly isTurboFrame = true;
  readonly domId: string;
  private readonly template: TemplateResponse;

  constructor({ domId, context = {}, status, headers, ...templateOptions }: TurboFrameTemplateResponseOptions) {
    super({ status, headers });
    this.domId = domId;
    this.template = new TemplateResponse({
      ...templateOptions,
      context: { ...context, turbo_frame_dom_id: domId, is_turbo_frame: true },
    });
  }

  get templateNames(): readonly string[] {
    return this.template.templateNames;
  }

  get contextData(): Readonly<TemplateContext> {
    return this.template.contextData;
  }

  get renderedContent(): Uint8Array {
    return renderTurboFrame(this.domId, this.template.renderedContent);
  }
}

/**
 * Turbo-stream response whose body is produced chunk by chunk, for
 * example from `renderTurboStreams` over a generator. It has no
 * buffered content.
 */
export class TurboStreamStreamingResponse {
  readonly isTurboStream = true;
  statusCode: number;
  readonly streamingContent: Iterable<Content> | AsyncIterable<Content>;
  private readonly response: HttpResponse;

  constructor({ streamingContent, status, headers }: TurboStreamStreamingResponseOptions) {
    this.response = new HttpResponse('', { status, headers, contentType: TURBO_STREAM_CONTENT_TYPE });
    this.statusCode = this.response.statusCode;
    this.streamingContent = streamingContent;
  }

  get headers(): Headers {
    return this.response.headers;
  }

  get contentType(): string | null {
    return this.response.contentType;
  }

  toResponse(): Response {
    const iterator = toAsyncIterator(this.streamingContent);
    const body = new ReadableStream<Uint8Array>({
      async pull(controller) {
        const next = await iterator.next();
        if (next.done) {
          controller.close();
        } else {
          controller.enqueue(encodeContent(next.value));
        }
      },
      async cancel() {
        await iterator.return?.();
      },
    });

    return new Response(body, {
      status: this.statusCode,
      headers: new Headers(this.headers),
    });
  }
}

function isAsyncIterable(
  source: Iterable<Content> | AsyncIterable<Content>
): source is AsyncIterable<Content> {
  return Symbol.asyncIterator in source;
}

function toAsyncIterator(source: Iterable<Content> | AsyncIterable<Content>): AsyncIterator<Content> {
  if (isAsyncIterable(source)) {
    return source[Symbol.asyncIterator]();
  }
  const iterator = source[Symbol.iterator]();
  return {
    next: async () => iterator.next(),
    return: async () => iterator.return?.() ?? { done: true, value: undefined },
  };
}
