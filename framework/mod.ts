/**
 * turbo-response
 *
 * Hotwire Turbo responses for a small request/response framework:
 * turbo-stream and turbo-frame markup, eager and template-deferred
 * responses, and handler mixins that build them.
 *
 * @module turbo-response
 */

// HTTP
export {
  HttpRequest,
  HttpResponse,
  ResponseWrapper,
  DeferredResponse,
  HttpStatus,
  DEFAULT_CONTENT_TYPE,
  concatBytes,
  encodeContent,
  decodeContent,
  type Content,
  type RedirectStatus,
  type RequestContext,
  type ResponseLike,
  type ResponseOptions,
  type StatusCarrier,
} from './http/mod.ts';

// Views
export {
  TemplateEngine,
  TemplateNotFoundError,
  TemplateResponse,
  SafeHtml,
  html,
  escape,
  raw,
  createElement,
  openTag,
  closeTag,
  type AttributeValue,
  type TemplateContext,
  type TemplateOptions,
  type TemplateRenderer,
  type TemplateResponseOptions,
} from './view/mod.ts';

// Controllers
export {
  Controller,
  FormController,
  action,
  validateData,
  ValidationError,
  type ActionOptions,
  type Form,
  type ValidationSchema,
} from './controller/mod.ts';

// Turbo
export * from './turbo/mod.ts';

// Errors
export {
  ContentNotRenderedError,
  ImproperlyConfiguredError,
  InvalidActionError,
  InvalidArgumentError,
} from './errors.ts';

// Configuration
export { Config, loadConfig, type ConfigOptions } from './config/mod.ts';

// Telemetry
export {
  Logger,
  getLogger,
  setLogger,
  createRequestLogger,
  withSpanSync,
  type LogEntry,
  type LogLevel,
  type LoggerOptions,
} from './telemetry/mod.ts';
