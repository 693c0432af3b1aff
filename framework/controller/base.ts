/**
 * Base Controller
 *
 * Provides common functionality for request handling.
 */

import type { Config } from '../config/config.ts';
import { ImproperlyConfiguredError } from '../errors.ts';
import { HttpRequest } from '../http/request.ts';
import { HttpResponse } from '../http/response.ts';
import type { RedirectStatus, ResponseLike, ResponseOptions } from '../http/types.ts';
import { HttpStatus } from '../http/types.ts';
import { createRequestLogger, getLogger } from '../telemetry/logger.ts';
import { escape } from '../view/html.ts';
import type { TemplateContext, TemplateRenderer } from '../view/template.ts';
import { TemplateResponse } from '../view/template_response.ts';

/**
 * Base controller
 */
export class Controller {
  request!: HttpRequest;
  templateEngine!: TemplateRenderer;
  templateName?: string;

  /**
   * Attach the request being handled and the engine templates render with
   */
  setContext(request: HttpRequest, templateEngine: TemplateRenderer): this {
    this.request = request;
    this.templateEngine = templateEngine;
    return this;
  }

  get params(): Record<string, string> {
    return this.request.params;
  }

  get query(): URLSearchParams {
    return this.request.query;
  }

  queryParam(name: string, defaultValue?: string): string | undefined {
    return this.request.query.get(name) ?? defaultValue;
  }

  /**
   * Get a required route parameter (throws if missing)
   */
  requireParam(name: string): string {
    const value = this.params[name];
    if (!value) {
      throw new Error(`Required parameter '${name}' is missing`);
    }
    return value;
  }

  /**
   * Candidate template names, most specific first
   */
  getTemplateNames(): readonly string[] {
    if (!this.templateName) {
      throw new ImproperlyConfiguredError(
        `${this.constructor.name} requires either a templateName or an implementation of getTemplateNames()`
      );
    }
    return [this.templateName];
  }

  getContextData(extra: TemplateContext = {}): TemplateContext {
    return { params: this.params, ...extra };
  }

  renderToResponse(context: TemplateContext = {}, options: ResponseOptions = {}): TemplateResponse {
    return new TemplateResponse({
      ...options,
      request: this.request,
      template: this.getTemplateNames(),
      context,
      engine: this.templateEngine,
    });
  }

  html(content: string, status: number = HttpStatus.OK): HttpResponse {
    return new HttpResponse(content, { status });
  }

  redirect(url: string, status: RedirectStatus = HttpStatus.FOUND): HttpResponse {
    return HttpResponse.redirect(url, status);
  }

  /**
   * Validate request data (throws ValidationError)
   */
  validate<T extends Record<string, unknown>>(data: T, schema: ValidationSchema): T {
    const errors = validateData(data, schema);
    if (errors.length > 0) {
      throw new ValidationError(errors);
    }
    return data;
  }
}

export interface ActionOptions {
  params?: Record<string, string>;
  /** Render configuration errors as a diagnostic page instead of rethrowing */
  debug?: boolean;
  /** Supplies `debug` when the option is not given */
  config?: Config;
}

/**
 * Turn a controller method into a native request handler
 *
 * @example
 * const handler = action(MessageController, (c) => c.post(), engine);
 * const response = await handler(new Request('http://localhost/messages', { method: 'POST' }));
 */
export function action<T extends Controller>(
  ControllerClass: new () => T,
  handle: (controller: T) => ResponseLike | Promise<ResponseLike>,
  templateEngine: TemplateRenderer,
  options: ActionOptions = {}
): (request: Request) => Promise<Response> {
  const debug = options.debug ?? options.config?.getBoolean('debug', false) ?? false;

  return async (request: Request): Promise<Response> => {
    const req = new HttpRequest(request, { params: options.params });
    const logger = createRequestLogger(getLogger(), req);
    const controller = new ControllerClass().setContext(req, templateEngine);

    try {
      const result = await handle(controller);
      return result.toResponse();
    } catch (error) {
      if (!(error instanceof ImproperlyConfiguredError)) {
        throw error;
      }
      logger.error('Handler is improperly configured', error, { controller: ControllerClass.name });
      if (!debug) {
        throw error;
      }
      return new HttpResponse(
        `<h1>${escape(error.name)}</h1><pre>${escape(error.message)}</pre>`,
        { status: HttpStatus.INTERNAL_SERVER_ERROR }
      ).toResponse();
    }
  };
}

export interface ValidationSchema {
  [field: string]: {
    type?: 'string' | 'number' | 'boolean' | 'object';
    required?: boolean;
    min?: number;
    max?: number;
    minLength?: number;
    maxLength?: number;
    pattern?: RegExp;
  };
}

export class ValidationError extends Error {
  errors: string[];

  constructor(errors: string[]) {
    super(`Validation failed: ${errors.join(', ')}`);
    this.name = 'ValidationError';
    this.errors = errors;
  }
}

/**
 * Check data against a schema, returning one message per failed rule
 */
export function validateData(data: Record<string, unknown>, schema: ValidationSchema): string[] {
  const errors: string[] = [];

  for (const [field, rules] of Object.entries(schema)) {
    const value = data[field];

    if (value === undefined || value === null || value === '') {
      if (rules.required) {
        errors.push(`${field} is required`);
      }
      continue;
    }

    if (rules.type && typeof value !== rules.type) {
      errors.push(`${field} must be a ${rules.type}`);
    }

    if (rules.min !== undefined && typeof value === 'number' && value < rules.min) {
      errors.push(`${field} must be at least ${rules.min}`);
    }

    if (rules.max !== undefined && typeof value === 'number' && value > rules.max) {
      errors.push(`${field} must be at most ${rules.max}`);
    }

    if (rules.minLength !== undefined && typeof value === 'string' && value.length < rules.minLength) {
      errors.push(`${field} must be at least ${rules.minLength} characters`);
    }

    if (rules.maxLength !== undefined && typeof value === 'string' && value.length > rules.maxLength) {
      errors.push(`${field} must be at most ${rules.maxLength} characters`);
    }

    if (rules.pattern && typeof value === 'string' && !rules.pattern.test(value)) {
      errors.push(`${field} format is invalid`);
    }
  }

  return errors;
}
