/**
 * Request Wrapper
 *
 * Wraps the Fetch Request with the helpers route handlers and
 * middleware need: path, query, route params, media type negotiation
 * and cached body parsing.
 */

import { acceptsMediaType } from './negotiation.ts';

export interface RequestContext {
  params: Record<string, string>;
}

export class AppRequest {
  private _request: Request;
  private _url: URL;
  private _context: RequestContext;
  private _text: Promise<string> | null = null;

  constructor(request: Request, context?: Partial<RequestContext>) {
    this._request = request;
    this._url = new URL(request.url);
    this._context = {
      params: context?.params ?? {},
    };
  }

  get method(): string {
    return this._request.method;
  }

  get url(): URL {
    return this._url;
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
   * Media type of the body, lowercased and without parameters
   */
  get contentType(): string | null {
    const value = this.header('Content-Type');
    if (!value) return null;
    return value.split(';')[0].trim().toLowerCase();
  }

  /**
   * Check the Accept header for a media type
   */
  accepts(mediaType: string): boolean {
    return acceptsMediaType(this.header('Accept'), mediaType);
  }

  get acceptsJson(): boolean {
    return this.accepts('application/json');
  }

  /**
   * Get the client IP address (accounting for proxies)
   */
  get ip(): string {
    return (
      this.header('X-Forwarded-For')?.split(',')[0]?.trim() ??
      this.header('X-Real-IP') ??
      'unknown'
    );
  }

  /**
   * Read the body as text. The stream is consumed once and cached.
   */
  text(): Promise<string> {
    if (!this._text) {
      this._text = this._request.text();
    }
    return this._text;
  }

  /**
   * Parse the body as JSON. Throws a SyntaxError on malformed input.
   */
  async json(): Promise<unknown> {
    const text = await this.text();
    return JSON.parse(text);
  }

  setParams(params: Record<string, string>): void {
    this._context.params = params;
  }
}
