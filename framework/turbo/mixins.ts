/**
 * Turbo Mixins
 *
 * Class mixins that give a handler Turbo responses. A handler declares
 * an action and target (streams) or a dom id (frames), as fields or by
 * overriding the accessors, and calls the matching render method.
 *
 * @example
 * class MessageController extends TurboStreamTemplateResponseMixin(Controller) {
 *   turboStreamAction = Action.Append;
 *   turboStreamTarget = 'messages';
 *   templateName = 'messages/_message.html';
 *
 *   create(): TurboStreamTemplateResponse {
 *     return this.renderTurboStreamTemplateResponse({ message: 'hi' });
 *   }
 * }
 *
 * The template mixins need a request, a template engine and
 * `getTemplateNames()` on the base class; `TurboFormMixin` needs
 * `formInvalid()`. Bases without them are rejected at compile time.
 */

import type { Form } from '../controller/form.ts';
import { ImproperlyConfiguredError, InvalidArgumentError } from '../errors.ts';
import type { HttpRequest } from '../http/request.ts';
import type { Content, ResponseLike, ResponseOptions } from '../http/types.ts';
import { HttpStatus } from '../http/types.ts';
import { getLogger } from '../telemetry/logger.ts';
import type { TemplateContext, TemplateRenderer } from '../view/template.ts';
import type { Action } from './renderers.ts';
import {
  TurboFrameResponse,
  TurboFrameTemplateResponse,
  TurboStreamResponse,
  TurboStreamTemplateResponse,
} from './response.ts';

// Mixin bases must accept any constructor arguments.
export type Constructor<T = object> = new (...args: any[]) => T;

export interface SupportsRequest {
  request: HttpRequest;
}

export interface SupportsTemplateEngine {
  templateEngine: TemplateRenderer;
}

export interface SupportsTemplateNames {
  getTemplateNames(): readonly string[];
}

export interface SupportsFormInvalid {
  formInvalid(form: Form): ResponseLike;
}

export type TemplateHost = SupportsRequest & SupportsTemplateEngine & SupportsTemplateNames;

export type TransportOptions = Omit<ResponseOptions, 'contentType'>;

export function TurboStreamResponseMixin<TBase extends Constructor>(Base: TBase) {
  return class TurboStreamResponseHandler extends Base {
    turboStreamAction?: Action;
    turboStreamTarget?: string;

    getTurboStreamAction(): Action | undefined {
      return this.turboStreamAction;
    }

    getTurboStreamTarget(): string | undefined {
      return this.turboStreamTarget;
    }

    /**
     * Content wrapped by `renderTurboStreamResponse`
     */
    getResponseContent(): Content {
      return '';
    }

    renderTurboStreamResponse(options: TransportOptions = {}): TurboStreamResponse {
      const action = this.getTurboStreamAction();
      const target = this.getTurboStreamTarget();

      if (action === undefined) {
        throw new InvalidArgumentError('action must be specified');
      }
      if (!target) {
        throw new InvalidArgumentError('target must be specified');
      }

      getLogger().debug('Rendering turbo-stream response', { action, target });

      return new TurboStreamResponse({
        ...options,
        action,
        target,
        content: this.getResponseContent(),
      });
    }
  };
}

export function TurboStreamTemplateResponseMixin<TBase extends Constructor<TemplateHost>>(Base: TBase) {
  return class TurboStreamTemplateResponseHandler extends TurboStreamResponseMixin(Base) {
    getTurboStreamTemplateNames(): readonly string[] {
      return this.getTemplateNames();
    }

    renderTurboStreamTemplateResponse(
      context: TemplateContext = {},
      options: TransportOptions = {}
    ): TurboStreamTemplateResponse {
      const target = this.getTurboStreamTarget();
      if (!target) {
        throw new ImproperlyConfiguredError('target is not set');
      }

      const action = this.getTurboStreamAction();
      if (action === undefined) {
        throw new ImproperlyConfiguredError('action is not set');
      }

      const template = this.getTurboStreamTemplateNames();
      getLogger().debug('Rendering turbo-stream template response', { action, target, template });

      return new TurboStreamTemplateResponse({
        ...options,
        request: this.request,
        template,
        context,
        action,
        target,
        engine: this.templateEngine,
      });
    }
  };
}

export function TurboFrameResponseMixin<TBase extends Constructor>(Base: TBase) {
  return class TurboFrameResponseHandler extends Base {
    turboFrameDomId?: string;

    getTurboFrameDomId(): string | undefined {
      return this.turboFrameDomId;
    }

    getResponseContent(): Content {
      return '';
    }

    renderTurboFrameResponse(options: ResponseOptions = {}): TurboFrameResponse {
      const domId = this.getTurboFrameDomId();
      if (!domId) {
        throw new InvalidArgumentError('dom_id must be specified');
      }

      getLogger().debug('Rendering turbo-frame response', { domId });

      return new TurboFrameResponse({
        ...options,
        domId,
        content: this.getResponseContent(),
      });
    }
  };
}

export function TurboFrameTemplateResponseMixin<TBase extends Constructor<TemplateHost>>(Base: TBase) {
  return class TurboFrameTemplateResponseHandler extends TurboFrameResponseMixin(Base) {
    getTurboFrameTemplateNames(): readonly string[] {
      return this.getTemplateNames();
    }

    renderTurboFrameTemplateResponse(
      context: TemplateContext = {},
      options: TransportOptions = {}
    ): TurboFrameTemplateResponse {
      const domId = this.getTurboFrameDomId();
      if (!domId) {
        throw new ImproperlyConfiguredError('dom_id is not set');
      }

      const template = this.getTurboFrameTemplateNames();
      getLogger().debug('Rendering turbo-frame template response', { domId, template });

      return new TurboFrameTemplateResponse({
        ...options,
        request: this.request,
        template,
        context,
        domId,
        engine: this.templateEngine,
      });
    }
  };
}

/**
 * Rejected forms answer 422 so Turbo renders the response in place.
 * Only the status of the response `formInvalid` produced is changed.
 */
export function TurboFormMixin<TBase extends Constructor<SupportsFormInvalid>>(Base: TBase) {
  return class TurboFormHandler extends Base {
    formInvalid(form: Form): ResponseLike {
      const response = super.formInvalid(form);
      response.statusCode = HttpStatus.UNPROCESSABLE_ENTITY;
      return response;
    }
  };
}
