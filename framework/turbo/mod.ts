/**
 * Turbo
 *
 * Hotwire Turbo support for the response layer: turbo-stream and
 * turbo-frame markup, responses built around it and the handler mixins
 * that produce them.
 */

export {
  Action,
  isAction,
  parseAction,
  renderTurboFrame,
  renderTurboStream,
  renderTurboStreams,
  type TurboStreamMessage,
} from './renderers.ts';
export {
  TURBO_STREAM_CONTENT_TYPE,
  TurboFrameResponse,
  TurboFrameTemplateResponse,
  TurboStreamResponse,
  TurboStreamStreamingResponse,
  TurboStreamTemplateResponse,
  type TurboFrameResponseOptions,
  type TurboFrameTemplateResponseOptions,
  type TurboStreamResponseOptions,
  type TurboStreamStreamingResponseOptions,
  type TurboStreamTemplateResponseOptions,
} from './response.ts';
export {
  TurboFormMixin,
  TurboFrameResponseMixin,
  TurboFrameTemplateResponseMixin,
  TurboStreamResponseMixin,
  TurboStreamTemplateResponseMixin,
  type Constructor,
  type SupportsFormInvalid,
  type SupportsRequest,
  type SupportsTemplateEngine,
  type SupportsTemplateNames,
  type TemplateHost,
  type TransportOptions,
} from './mixins.ts';
