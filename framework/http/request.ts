/**
 * Request Wrapper
 *
 * Wraps the native Request with the properties handlers and templates
 * read, including the headers Turbo sends.
 */

export interface RequestContext {
  params: Record<string, string>;
}

/**
 * Enhanced request
 */
export class HttpRequest {
  private _request: Request;
  private _url: URL;
  private _context: RequestContext;
  private _text: Promise<string> | null = null;
  private _formData: Promise<FormData> | null = null;

  constructor(request: Request, context?: Partial<RequestContext>) {
    this._request = request;
    this._url = new URL(request.url);
    this._context = {
      params: context?.params ?? {},
    };
  }

  /**
   * The underlying native Request
   */
  get raw(): Request {
    return this._request;
  }

  get method(): string {
    return this._request.method;
  }

  get url(): string {
    return this._request.url;
  }

  /**
   * URL path (without query string)
   */
  get path(): string {
    return this._url.pathname;
  }

  get query(): URLSearchParams {
    return this._url.searchParams;
  }

  /**
   * Route parameters extracted from path
   */
  get params(): Record<string, string> {
    return this._context.params;
  }

  get headers(): Headers {
    return this._request.headers;
  }

  header(name: string): string | null {
    return this._request.headers.get(name);
  }

  /**
   * Whether the client advertised turbo-stream support in Accept
   */
  get acceptsTurboStream(): boolean {
    const accept = this.header('Accept') ?? '';
    return accept.split(',').some((part) => part.includes('turbo-stream'));
  }

  /**
   * Id of the frame that issued this request, if any
   */
  get turboFrame(): string | null {
    return this.header('Turbo-Frame');
  }

  /**
   * Body as text. The native body can only be read once, so it is cached.
   */
  text(): Promise<string> {
    if (!this._text) {
      this._text = this._request.text();
    }
    return this._text;
  }

  /**
   * Body as FormData
   */
  formData(): Promise<FormData> {
    if (!this._formData) {
      this._formData = this._request.formData();
    }
    return this._formData;
  }

  /**
   * Set route parameters (used by dispatch)
   */
  setParams(params: Record<string, string>): void {
    this._context.params = params;
  }
}
