/**
 * Presentation Layer
 *
 * HTML escaping, the template engine and template-backed responses.
 */

export {
  TemplateEngine,
  TemplateNotFoundError,
  type TemplateOptions,
  type TemplateContext,
  type TemplateRenderer,
} from './template.ts';
export { TemplateResponse, type TemplateResponseOptions } from './template_response.ts';
export { SafeHtml, html, escape, raw, createElement, openTag, closeTag, type AttributeValue } from './html.ts';
