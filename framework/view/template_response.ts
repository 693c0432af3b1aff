/**
 * Template Response
 *
 * A response rendered from a template when its body is first asked
 * for, not at construction. Template names and context are fixed once
 * the response is built; the context is a frozen copy.
 */

import type { HttpRequest } from '../http/request.ts';
import { encodeContent } from '../http/response.ts';
import type { ResponseOptions } from '../http/types.ts';
import { DeferredResponse } from '../http/wrapper.ts';
import type { TemplateContext, TemplateRenderer } from './template.ts';

export interface TemplateResponseOptions extends ResponseOptions {
  request: HttpRequest;
  /** Template name, or candidate names in order of preference */
  template: string | readonly string[];
  context?: TemplateContext;
  engine: TemplateRenderer;
}

export class TemplateResponse extends DeferredResponse {
  readonly request: HttpRequest;
  readonly templateNames: readonly string[];
  readonly contextData: Readonly<TemplateContext>;
  readonly engine: TemplateRenderer;

  constructor(options: TemplateResponseOptions) {
    super({ status: options.status, headers: options.headers, contentType: options.contentType });
    this.request = options.request;
    this.templateNames = typeof options.template === 'string' ? [options.template] : options.template;
    this.contextData = Object.freeze({ ...options.context });
    this.engine = options.engine;
  }

  get renderedContent(): Uint8Array {
    return encodeContent(this.engine.render(this.templateNames, this.contextData, this.request));
  }
}
