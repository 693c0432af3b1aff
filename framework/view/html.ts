/**
 * HTML Utilities
 *
 * Escaping and element construction for markup the framework emits.
 */

/**
 * Content that is already safe to emit without escaping
 */
export class SafeHtml {
  constructor(public readonly content: string) {}

  toString(): string {
    return this.content;
  }
}

/**
 * Escape HTML entities
 */
export function escape(value: unknown): string {
  if (value instanceof SafeHtml) {
    return value.content;
  }

  return String(value ?? '')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Mark content as safe (no escaping)
 */
export function raw(content: string): SafeHtml {
  return new SafeHtml(content);
}

/**
 * HTML tagged template literal
 *
 * Escapes interpolated values unless wrapped with raw().
 *
 * @example
 * const target = 'a"b';
 * html`<turbo-stream target="${target}">`
 * // Output: <turbo-stream target="a&quot;b">
 */
export function html(strings: TemplateStringsArray, ...values: unknown[]): SafeHtml {
  let result = '';

  for (let i = 0; i < strings.length; i++) {
    result += strings[i];

    if (i < values.length) {
      result += escape(values[i]);
    }
  }

  return new SafeHtml(result);
}

const VOID_ELEMENTS = new Set([
  'area', 'base', 'br', 'col', 'embed', 'hr', 'img', 'input', 'link', 'meta', 'source', 'track', 'wbr',
]);

export type AttributeValue = string | boolean | number | null | undefined;

function renderAttributes(attributes: Record<string, AttributeValue>): string {
  const attrs = Object.entries(attributes)
    .filter(([, value]) => value !== null && value !== undefined && value !== false)
    .map(([key, value]) => (value === true ? key : `${key}="${escape(String(value))}"`))
    .join(' ');

  return attrs ? ` ${attrs}` : '';
}

/**
 * Opening tag alone, attributes escaped as in `createElement`
 */
export function openTag(tag: string, attributes: Record<string, AttributeValue> = {}): SafeHtml {
  return new SafeHtml(`<${tag}${renderAttributes(attributes)}>`);
}

export function closeTag(tag: string): SafeHtml {
  return new SafeHtml(`</${tag}>`);
}

/**
 * Create an HTML element. Attribute values are escaped, attributes in
 * insertion order; string children are escaped, SafeHtml children are not.
 */
export function createElement(
  tag: string,
  attributes: Record<string, AttributeValue> = {},
  children: (string | SafeHtml)[] = []
): SafeHtml {
  if (VOID_ELEMENTS.has(tag.toLowerCase()) && children.length === 0) {
    return new SafeHtml(`<${tag}${renderAttributes(attributes)} />`);
  }

  const body = children.map((child) => escape(child)).join('');
  return new SafeHtml(`${openTag(tag, attributes).content}${body}${closeTag(tag).content}`);
}
