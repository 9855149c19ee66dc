/**
 * Middleware Pipeline
 *
 * Runs middleware as an onion around a final handler. Each middleware can:
 * - Inspect the request before the handler
 * - Short-circuit and return an early response
 * - Inspect/modify the response after the handler
 */

import type { Context, Middleware, Next, RouteHandler } from '../http/types.ts';

export class MiddlewarePipeline {
  private middleware: Middleware[] = [];

  constructor(middleware: Middleware[] = []) {
    this.middleware = [...middleware];
  }

  use(middleware: Middleware): this {
    this.middleware.push(middleware);
    return this;
  }

  get length(): number {
    return this.middleware.length;
  }

  /**
   * Execute the pipeline, ending in the final handler
   */
  async execute(ctx: Context, finalHandler: RouteHandler): Promise<Response> {
    const dispatch = async (index: number): Promise<Response> => {
      if (index >= this.middleware.length) {
        return await finalHandler(ctx);
      }

      const middleware = this.middleware[index];
      let nextCalled = false;
      const next: Next = async () => {
        if (nextCalled) {
          throw new Error(`next() called multiple times in ${middleware.name || `middleware[${index}]`}`);
        }
        nextCalled = true;
        return await dispatch(index + 1);
      };

      return await middleware(ctx, next);
    };

    return await dispatch(0);
  }
}

