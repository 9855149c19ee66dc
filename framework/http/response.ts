/**
 * Response Builder
 *
 * Fluent interface for building Fetch Responses.
 */

export const JSON_MEDIA_TYPE = 'application/json';

export interface ResponseOptions {
  status?: number;
  headers?: Record<string, string>;
}

export class AppResponse {
  private _status: number = 200;
  private _headers: Headers = new Headers();
  private _body: string | null = null;

  constructor(options?: ResponseOptions) {
    if (options?.status) {
      this._status = options.status;
    }
    if (options?.headers) {
      this.headers(options.headers);
    }
  }

  /**
   * Set the response status code
   */
  status(code: number): this {
    this._status = code;
    return this;
  }

  /**
   * Set a response header
   */
  header(name: string, value: string): this {
    this._headers.set(name, value);
    return this;
  }

  /**
   * Set multiple headers
   */
  headers(headers: Record<string, string>): this {
    for (const [name, value] of Object.entries(headers)) {
      this._headers.set(name, value);
    }
    return this;
  }

  /**
   * Set the Location header
   */
  location(url: string): this {
    return this.header('Location', url);
  }

  /**
   * Send a JSON response
   */
  json(data: unknown): Response {
    this._headers.set('Content-Type', JSON_MEDIA_TYPE);
    this._body = JSON.stringify(data);
    return this.build();
  }

  /**
   * Send a JSON error body of the form `{ "message": ... }`
   */
  message(status: number, message: string): Response {
    this._status = status;
    return this.json({ message });
  }

  /**
   * Build the final Response object
   */
  build(): Response {
    return new Response(this._body, {
      status: this._status,
      headers: new Headers(this._headers),
    });
  }
}
