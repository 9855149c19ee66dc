/**
 * Post Routes
 *
 * JSON API for posts:
 *
 *   GET  /api/posts            list, with optional title_like / body_like
 *   GET  /api/posts/:id        fetch one
 *   POST /api/posts            create
 *
 * @module
 */

import type { Application } from '../../../../framework/app.ts';
import type { Context } from '../../../../framework/http/types.ts';
import { JSON_MEDIA_TYPE } from '../../../../framework/http/response.ts';
import { requireContentType } from '../../../../framework/middleware/negotiation.ts';
import { created, ok } from '../../../../framework/api/response.ts';
import {
  BadRequestError,
  NotFoundError,
  UnprocessableEntityError,
} from '../../../../framework/api/errors.ts';
import {
  isRecord,
  validate,
  validators,
  type ValidationSchema,
} from '../../../../framework/validation/validators.ts';
import { serializePost, type PostInput } from '../domain/post.ts';
import type { PostFilter } from '../domain/post_filters.ts';
import type { PostService } from '../application/post_service.ts';

export const POSTS_PATH = '/api/posts';

const createPostSchema: ValidationSchema = {
  title: [validators.required(), validators.string()],
  body: [validators.required(), validators.string()],
};

export function postLocation(id: number): string {
  return `${POSTS_PATH}/${id}`;
}

/**
 * Read the list filters from the query string. Absent parameters
 * leave the field unconstrained.
 */
export function filterFromQuery(query: URLSearchParams): PostFilter {
  return {
    titleLike: query.get('title_like') ?? undefined,
    bodyLike: query.get('body_like') ?? undefined,
  };
}

/**
 * Parse and validate a create payload. Unknown fields, `id` included,
 * are dropped.
 */
async function readCreatePayload(ctx: Context): Promise<PostInput> {
  let data: unknown;
  try {
    data = await ctx.request.json();
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new BadRequestError('Request body must be a JSON object');
    }
    throw error;
  }

  if (!isRecord(data)) {
    throw new BadRequestError('Request body must be a JSON object');
  }

  const errors = validate(data, createPostSchema);
  if (errors.length > 0) {
    throw new UnprocessableEntityError(errors);
  }

  return { title: String(data.title), body: String(data.body) };
}

/**
 * Register post routes
 */
export function registerPostRoutes(app: Application, service: PostService): void {
  app.get(POSTS_PATH, async (ctx: Context) => {
    const posts = await service.listPosts(filterFromQuery(ctx.query));
    return ok(posts.map(serializePost));
  });

  app.get(`${POSTS_PATH}/:id(\\d+)`, async (ctx: Context) => {
    const raw = ctx.params.id;
    const id = Number.parseInt(raw, 10);
    if (!Number.isSafeInteger(id)) {
      throw new NotFoundError(`Could not find post with id ${raw}`);
    }

    const post = await service.getPost(id);
    if (!post) {
      throw new NotFoundError(`Could not find post with id ${id}`);
    }

    return ok(serializePost(post));
  });

  app.post(
    POSTS_PATH,
    async (ctx: Context) => {
      const input = await readCreatePayload(ctx);
      const post = await service.createPost(input);
      ctx.logger.info('Post created', { postId: post.id });
      return created(serializePost(post), postLocation(post.id));
    },
    { middleware: [requireContentType(JSON_MEDIA_TYPE)] }
  );
}
