/**
 * Post Filters
 *
 * Optional substring filters over post fields. Each supplied filter
 * becomes one predicate; a post is kept only if every predicate holds.
 *
 * @module
 */

import type { Post } from './post.ts';

export interface PostFilter {
  titleLike?: string;
  bodyLike?: string;
}

export type PostPredicate = (post: Post) => boolean;

type FilterableField = 'title' | 'body';

/**
 * Which post field each filter applies to, in evaluation order
 */
const FILTER_FIELDS: ReadonlyArray<readonly [keyof PostFilter, FilterableField]> = [
  ['titleLike', 'title'],
  ['bodyLike', 'body'],
];

/**
 * Case-insensitive literal substring test
 */
export function containsIgnoreCase(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

export function buildPostPredicates(filter: PostFilter): PostPredicate[] {
  const predicates: PostPredicate[] = [];

  for (const [key, field] of FILTER_FIELDS) {
    const needle = filter[key];
    if (needle === undefined) continue;
    predicates.push((post) => containsIgnoreCase(post[field], needle));
  }

  return predicates;
}

export function matchesAll(predicates: PostPredicate[]): PostPredicate {
  return (post) => predicates.every((predicate) => predicate(post));
}

/**
 * Keep the posts matching every supplied filter, preserving order
 */
export function applyPostFilter(posts: Post[], filter: PostFilter): Post[] {
  const predicates = buildPostPredicates(filter);
  if (predicates.length === 0) return posts;
  return posts.filter(matchesAll(predicates));
}
