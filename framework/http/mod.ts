/**
 * HTTP Layer
 *
 * Request and response objects the rest of the framework builds on.
 * Responses stay mutable until they are converted to a native Response
 * for the transport.
 */

export { HttpRequest, type RequestContext } from './request.ts';
export { HttpResponse, DEFAULT_CONTENT_TYPE, concatBytes, encodeContent, decodeContent } from './response.ts';
export { ResponseWrapper, DeferredResponse } from './wrapper.ts';
export {
  HttpStatus,
  type Content,
  type RedirectStatus,
  type ResponseLike,
  type ResponseOptions,
  type StatusCarrier,
} from './types.ts';
