/**
 * Turbo Markup
 *
 * Wraps HTML fragments in the elements the Turbo client understands:
 *
 * ```html
 * <turbo-stream action="replace" target="msg-1"><p>hi</p></turbo-stream>
 * <turbo-frame id="frame-2"><div>x</div></turbo-frame>
 * ```
 *
 * Attribute values are escaped. Content is inserted verbatim; escaping
 * untrusted content is the caller's job.
 */

import { concatBytes, encodeContent } from '../http/response.ts';
import type { Content } from '../http/types.ts';
import { closeTag, openTag, type AttributeValue } from '../view/html.ts';
import { InvalidActionError } from '../errors.ts';

/**
 * DOM mutation a turbo-stream element performs on its target
 */
export enum Action {
  Append = 'append',
  Prepend = 'prepend',
  Replace = 'replace',
  Update = 'update',
  Remove = 'remove',
  Before = 'before',
  After = 'after',
}

const ACTIONS: ReadonlySet<string> = new Set(Object.values(Action));

export function isAction(value: unknown): value is Action {
  return typeof value === 'string' && ACTIONS.has(value);
}

/**
 * Parse an action name, rejecting anything outside the known set
 */
export function parseAction(value: unknown): Action {
  if (!isAction(value)) {
    throw new InvalidActionError(value);
  }
  return value;
}

export interface TurboStreamMessage {
  action: Action;
  target: string;
  content?: Content;
}

// Content bytes are copied between the encoded tags untouched, so
// bodies that are not valid UTF-8 survive.
function wrapContent(tag: string, attributes: Record<string, AttributeValue>, content: Content): Uint8Array {
  return concatBytes([
    encodeContent(openTag(tag, attributes).content),
    encodeContent(content),
    encodeContent(closeTag(tag).content),
  ]);
}

export function renderTurboStream(action: Action, target: string, content: Content = ''): Uint8Array {
  return wrapContent('turbo-stream', { action: parseAction(action), target }, content);
}

export function renderTurboFrame(domId: string, content: Content = ''): Uint8Array {
  return wrapContent('turbo-frame', { id: domId }, content);
}

/**
 * Render several stream messages back to back, one element each
 */
export function renderTurboStreams(messages: Iterable<TurboStreamMessage>): Uint8Array {
  const chunks: Uint8Array[] = [];
  for (const { action, target, content } of messages) {
    chunks.push(renderTurboStream(action, target, content));
  }
  return concatBytes(chunks);
}
