/**
 * Post
 *
 * The single record type of the API. Ids are assigned by the store,
 * ascend in creation order and are never reused.
 *
 * @module
 */

export interface Post {
  readonly id: number;
  readonly title: string;
  readonly body: string;
}

export interface PostInput {
  title: string;
  body: string;
}

/**
 * The wire representation of a post. Anything else a store keeps on
 * its rows stays out of responses.
 */
export function serializePost(post: Post): Post {
  return { id: post.id, title: post.title, body: post.body };
}
