/**
 * Template Engine
 *
 * Small synchronous template engine used by template responses.
 *
 * Templates are looked up by name, first among templates registered in
 * memory and then as files under `viewsPath`. Callers may pass an ordered
 * list of candidate names; the first one that exists is rendered.
 *
 * Syntax:
 * ```html
 * <ul>
 * {% for message in messages %}
 *   <li class="{% if loop.first %}first{% else %}rest{% endif %}">{{ message.body }}</li>
 * {% endfor %}
 * </ul>
 * {{ banner|safe }}
 * ```
 *
 * Blocks of the same kind cannot be nested inside each other.
 */

import { existsSync, readFileSync } from 'node:fs';
import { extname, join } from 'node:path';
import type { Config } from '../config/config.ts';
import type { HttpRequest } from '../http/request.ts';
import type { Content } from '../http/types.ts';
import { escape } from './html.ts';

export interface TemplateOptions {
  viewsPath?: string;
  extension?: string;
  cache?: boolean;
}

export interface TemplateContext {
  [key: string]: unknown;
}

/**
 * What template responses need from an engine
 */
export interface TemplateRenderer {
  render(
    template: string | readonly string[],
    context?: TemplateContext,
    request?: HttpRequest
  ): Content;
}

/**
 * None of the candidate templates exist
 */
export class TemplateNotFoundError extends Error {
  readonly tried: readonly string[];

  constructor(tried: readonly string[]) {
    super(`Template not found, tried: ${tried.join(', ')}`);
    this.name = 'TemplateNotFoundError';
    this.tried = tried;
  }
}

const DEFAULT_OPTIONS: Required<TemplateOptions> = {
  viewsPath: './views',
  extension: '.html',
  cache: true,
};

// One pass over for-blocks, if-blocks and expressions, left to right.
const TOKEN_REGEX =
  /\{%\s*for\s+(\w+)\s+in\s+([\w.]+)\s*%\}([\s\S]*?)\{%\s*endfor\s*%\}|\{%\s*if\s+(.+?)\s*%\}([\s\S]*?)\{%\s*endif\s*%\}|\{\{\s*(.+?)\s*\}\}/g;
const ELSE_REGEX = /\{%\s*else\s*%\}/;
const COMPARISON_REGEX = /^(.+?)\s*(==|!=)\s*(.+)$/;

export class TemplateEngine implements TemplateRenderer {
  private options: Required<TemplateOptions>;
  private templates = new Map<string, string>();
  private fileCache = new Map<string, string>();

  constructor(options: TemplateOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Build an engine from the `views.*` configuration keys
   */
  static fromConfig(config: Config): TemplateEngine {
    return new TemplateEngine({
      viewsPath: config.getString('views.path', DEFAULT_OPTIONS.viewsPath),
      extension: config.getString('views.extension', DEFAULT_OPTIONS.extension),
      cache: config.getBoolean('views.cache', DEFAULT_OPTIONS.cache),
    });
  }

  get viewsPath(): string {
    return this.options.viewsPath;
  }

  /**
   * Register an in-memory template. Registered names shadow files.
   */
  registerTemplate(name: string, source: string): this {
    this.templates.set(name, source);
    return this;
  }

  /**
   * Find the first candidate that exists
   */
  selectTemplate(names: string | readonly string[]): { name: string; source: string } {
    const candidates = typeof names === 'string' ? [names] : names;

    for (const name of candidates) {
      const source = this.loadTemplate(name);
      if (source !== undefined) {
        return { name, source };
      }
    }

    throw new TemplateNotFoundError(candidates);
  }

  /**
   * Render the first existing candidate. The request is exposed to the
   * template as `request` unless the context already has that key.
   */
  render(
    template: string | readonly string[],
    context: TemplateContext = {},
    request?: HttpRequest
  ): string {
    const { source } = this.selectTemplate(template);
    const fullContext = request && !('request' in context) ? { request, ...context } : context;
    return this.renderString(source, fullContext);
  }

  /**
   * Render a template source string
   */
  renderString(template: string, context: TemplateContext = {}): string {
    return template.replace(
      TOKEN_REGEX,
      (
        _match: string,
        itemVar: string | undefined,
        arrayPath: string | undefined,
        loopBody: string | undefined,
        condition: string | undefined,
        ifBody: string | undefined,
        expression: string | undefined
      ) => {
        if (itemVar !== undefined && arrayPath !== undefined) {
          return this.renderLoop(itemVar, arrayPath, loopBody ?? '', context);
        }
        if (condition !== undefined) {
          const [whenTrue, whenFalse = ''] = (ifBody ?? '').split(ELSE_REGEX);
          return this.renderString(this.evaluateCondition(condition, context) ? whenTrue : whenFalse, context);
        }
        return this.renderExpression(expression ?? '', context);
      }
    );
  }

  private loadTemplate(name: string): string | undefined {
    const registered = this.templates.get(name);
    if (registered !== undefined) {
      return registered;
    }

    const path = join(this.options.viewsPath, extname(name) ? name : `${name}${this.options.extension}`);

    const cached = this.options.cache ? this.fileCache.get(path) : undefined;
    if (cached !== undefined) {
      return cached;
    }

    if (!existsSync(path)) {
      return undefined;
    }

    const source = readFileSync(path, 'utf8');
    if (this.options.cache) {
      this.fileCache.set(path, source);
    }
    return source;
  }

  private renderLoop(
    itemVar: string,
    arrayPath: string,
    body: string,
    context: TemplateContext
  ): string {
    const items = this.getValueByPath(context, arrayPath);
    if (!Array.isArray(items)) return '';

    return items
      .map((item: unknown, index: number) =>
        this.renderString(body, {
          ...context,
          [itemVar]: item,
          loop: {
            index,
            index1: index + 1,
            first: index === 0,
            last: index === items.length - 1,
            length: items.length,
          },
        })
      )
      .join('');
  }

  private renderExpression(expression: string, context: TemplateContext): string {
    const [path, ...filters] = expression.split('|').map((part) => part.trim());
    let value = this.evaluateValue(path, context);
    let safe = false;

    for (const filter of filters) {
      if (filter === 'safe') {
        safe = true;
      } else {
        value = this.applyFilter(value, filter);
      }
    }

    const text = value === null || value === undefined ? '' : String(value);
    return safe ? text : escape(text);
  }

  private evaluateCondition(condition: string, context: TemplateContext): boolean {
    if (condition.startsWith('not ')) {
      return !this.evaluateCondition(condition.slice(4).trim(), context);
    }

    const comparison = condition.match(COMPARISON_REGEX);
    if (comparison) {
      const [, left, operator, right] = comparison;
      const equal = this.evaluateValue(left.trim(), context) === this.evaluateValue(right.trim(), context);
      return operator === '==' ? equal : !equal;
    }

    const value = this.evaluateValue(condition, context);
    return Array.isArray(value) ? value.length > 0 : Boolean(value);
  }

  /**
   * Literal or variable
   */
  private evaluateValue(value: string, context: TemplateContext): unknown {
    if (
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      return value.slice(1, -1);
    }
    if (/^-?\d+(\.\d+)?$/.test(value)) return parseFloat(value);
    if (value === 'true') return true;
    if (value === 'false') return false;
    if (value === 'null' || value === 'none') return null;

    return this.getValueByPath(context, value);
  }

  private getValueByPath(obj: TemplateContext, path: string): unknown {
    let current: unknown = obj;

    for (const part of path.split('.')) {
      if (typeof current !== 'object' || current === null) return undefined;
      current = Reflect.get(current, part);
    }

    return current;
  }

  private applyFilter(value: unknown, filter: string): unknown {
    switch (filter) {
      case 'upper':
        return String(value ?? '').toUpperCase();
      case 'lower':
        return String(value ?? '').toLowerCase();
      case 'length':
        return Array.isArray(value) || typeof value === 'string' ? value.length : 0;
      case 'json':
        return JSON.stringify(value);
      default:
        throw new Error(`Unknown template filter: ${filter}`);
    }
  }
}
