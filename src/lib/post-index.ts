import { PostNotFoundError } from '@/lib/errors';
import type { Post } from '@/types/post';

export type PostLookup = { found: true; post: Post } | { found: false; error: PostNotFoundError };

export interface PostPage {
  page: number;
  totalPages: number;
  posts: Post[];
  previous?: number;
  next?: number;
}

export interface PostIndexOptions {
  pageSize?: number;
}

/** Newest first; equal dates by slug, then filename, so the order never depends on load order. */
export function comparePosts(a: Post, b: Post): number {
  if (a.publishDate !== b.publishDate) return a.publishDate < b.publishDate ? 1 : -1;
  if (a.slug !== b.slug) return a.slug < b.slug ? -1 : 1;
  if (a.filename !== b.filename) return a.filename < b.filename ? -1 : 1;
  return 0;
}

/**
 * Read-only, ordered view over a set of loaded posts. Rebuild it from a fresh
 * load to pick up changes.
 */
export class PostIndex {
  private readonly ordered: readonly Post[];
  private readonly bySlug: ReadonlyMap<string, Post>;
  readonly pageSize: number;

  constructor(posts: Iterable<Post>, options: PostIndexOptions = {}) {
    const pageSize = options.pageSize ?? 10;
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
    }
    this.pageSize = pageSize;
    this.ordered = Object.freeze([...posts].sort(comparePosts));

    const bySlug = new Map<string, Post>();
    for (const post of this.ordered) {
      // a later duplicate slug is shadowed by the newer post
      if (!bySlug.has(post.slug)) bySlug.set(post.slug, post);
    }
    this.bySlug = bySlug;
  }

  get size(): number {
    return this.ordered.length;
  }

  all(): readonly Post[] {
    return this.ordered;
  }

  lookup(slug: string): PostLookup {
    const post = this.bySlug.get(slug);
    return post ? { found: true, post } : { found: false, error: new PostNotFoundError(slug) };
  }

  /** Like {@link lookup}, but throws {@link PostNotFoundError}. */
  get(slug: string): Post {
    const result = this.lookup(slug);
    if (!result.found) throw result.error;
    return result.post;
  }

  get totalPages(): number {
    return Math.max(1, Math.ceil(this.ordered.length / this.pageSize));
  }

  /** 1-based listing page. An empty index still has one (empty) page. */
  page(n: number): PostPage {
    const totalPages = this.totalPages;
    if (!Number.isInteger(n) || n < 1 || n > totalPages) {
      throw new RangeError(`Page ${n} is out of range (1-${totalPages})`);
    }
    const start = (n - 1) * this.pageSize;
    return {
      page: n,
      totalPages,
      posts: this.ordered.slice(start, start + this.pageSize),
      previous: n > 1 ? n - 1 : undefined,
      next: n < totalPages ? n + 1 : undefined,
    };
  }

  /**
   * Neighbours in listing order: `newer` comes before the post, `older` after it.
   * Takes the post itself, since duplicate slugs share a slug but not a place.
   */
  adjacent(post: Post): { newer?: Post; older?: Post } {
    const i = this.ordered.indexOf(post);
    if (i === -1) throw new PostNotFoundError(post.slug);
    return {
      newer: i > 0 ? this.ordered[i - 1] : undefined,
      older: i < this.ordered.length - 1 ? this.ordered[i + 1] : undefined,
    };
  }
}
