/**
 * HTTP Server
 *
 * Bridges node:http to Fetch Request/Response handlers, so the rest of
 * the framework only ever sees Request and Response objects.
 */

import {
  createServer,
  type IncomingMessage,
  type Server as NodeServer,
  type ServerResponse,
} from 'node:http';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import { BadRequestError, toError } from '../api/errors.ts';
import { HttpStatus, errorResponse } from '../api/response.ts';
import { JSON_MEDIA_TYPE } from './response.ts';

export type FetchHandler = (request: Request) => Promise<Response> | Response;

export interface ListenAddress {
  hostname: string;
  port: number;
}

export interface ServerOptions {
  port?: number;
  hostname?: string;
  handler: FetchHandler;
  logger?: Logger;
  onListen?: (addr: ListenAddress) => void;
}

export class Server {
  private handler: FetchHandler;
  private options: Required<Pick<ServerOptions, 'port' | 'hostname'>> & ServerOptions;
  private logger: Logger;
  private server: NodeServer | null = null;

  constructor(options: ServerOptions) {
    this.handler = options.handler;
    this.logger = options.logger ?? getLogger();
    this.options = {
      ...options,
      port: options.port ?? 8000,
      hostname: options.hostname ?? '0.0.0.0',
    };
  }

  /**
   * Start listening. Resolves once the socket is bound.
   */
  async serve(): Promise<ListenAddress> {
    const server = createServer((incoming, outgoing) => {
      this.handleNodeRequest(incoming, outgoing).catch((error: unknown) => {
        this.logger.error('Request failed', toError(error), {
          method: incoming.method,
          url: incoming.url,
        });
        // Once headers are out the status can no longer change.
        if (outgoing.headersSent) {
          outgoing.end();
          return;
        }
        outgoing.statusCode = HttpStatus.INTERNAL_SERVER_ERROR;
        outgoing.setHeader('Content-Type', JSON_MEDIA_TYPE);
        outgoing.end(JSON.stringify({ message: 'Internal Server Error' }));
      });
    });
    this.server = server;

    const address = await new Promise<ListenAddress>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.port, this.options.hostname, () => {
        server.off('error', reject);
        const bound = server.address();
        const port = typeof bound === 'object' && bound !== null ? bound.port : this.options.port;
        resolve({ hostname: this.options.hostname, port });
      });
    });

    this.options.onListen?.(address);
    return address;
  }

  /**
   * Stop accepting connections and wait for open ones to finish
   */
  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeIdleConnections();
    });
  }

  private async handleNodeRequest(
    incoming: IncomingMessage,
    outgoing: ServerResponse
  ): Promise<void> {
    let request: Request;
    try {
      request = await toFetchRequest(incoming, `${this.options.hostname}:${this.options.port}`);
    } catch (error) {
      // An unparsable Host or target never reaches the handler.
      this.logger.warn('Malformed request', {
        method: incoming.method,
        url: incoming.url,
        reason: toError(error).message,
      });
      await writeFetchResponse(errorResponse(new BadRequestError()), outgoing);
      return;
    }

    const response = await this.handler(request);
    await writeFetchResponse(response, outgoing);
  }
}

/**
 * Convert a node:http request into a Fetch Request
 */
export async function toFetchRequest(
  incoming: IncomingMessage,
  fallbackHost: string
): Promise<Request> {
  const url = new URL(incoming.url ?? '/', `http://${incoming.headers.host ?? fallbackHost}`);
  const method = incoming.method ?? 'GET';

  const headers = new Headers();
  for (const [name, value] of Object.entries(incoming.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) headers.append(name, item);
    } else {
      headers.set(name, value);
    }
  }

  let body: string | undefined;
  if (method !== 'GET' && method !== 'HEAD') {
    const chunks: Buffer[] = [];
    for await (const chunk of incoming) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    if (chunks.length > 0) {
      body = Buffer.concat(chunks).toString('utf8');
    }
  }

  return new Request(url, { method, headers, body });
}

/**
 * Write a Fetch Response to a node:http response
 */
export async function writeFetchResponse(
  response: Response,
  outgoing: ServerResponse
): Promise<void> {
  outgoing.statusCode = response.status;
  response.headers.forEach((value, name) => {
    outgoing.setHeader(name, value);
  });
  const body = Buffer.from(await response.arrayBuffer());
  outgoing.end(body);
}
