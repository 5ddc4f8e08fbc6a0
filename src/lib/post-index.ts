import { DuplicatePostError, EmptyIndexError } from '@/lib/errors';
import type { Post, TagWithCount } from '@/types/post';

/** Read-only snapshot of a set of posts. Queries are lazy and never mutate it. */
export interface PostIndex {
  readonly size: number;
  allPublished(): IterableIterator<Post>;
  byTag(tag: string): IterableIterator<Post>;
  drafts(): IterableIterator<Post>;
  get(id: string): Post | undefined;
  bySlug(slug: string): Post | undefined;
  tags(): TagWithCount[];
  replace(post: Post): PostIndex;
}

/** Newest first; equal timestamps fall back to id so output is stable. */
export function comparePosts(a: Post, b: Post): number {
  return compareEntries({ post: a, time: a.publishedAt.getTime() }, { post: b, time: b.publishedAt.getTime() });
}

type Entry = { post: Post; time: number };

function compareEntries(a: Entry, b: Entry): number {
  const diff = b.time - a.time;
  if (diff !== 0) return diff;
  return a.post.id < b.post.id ? -1 : a.post.id > b.post.id ? 1 : 0;
}

function* where(posts: readonly Post[], keep: (post: Post) => boolean): IterableIterator<Post> {
  for (const post of posts) {
    if (keep(post)) yield post;
  }
}

export function createPostIndex(posts: Iterable<Post>): PostIndex {
  const byId = new Map<string, Post>();
  for (const post of posts) {
    if (byId.has(post.id)) throw new DuplicatePostError(post.id);
    byId.set(post.id, post);
  }
  // timestamps are read once here, so later changes to a Date cannot reorder the snapshot
  const ordered: readonly Post[] = Object.freeze(
    [...byId.values()]
      .map(post => ({ post, time: post.publishedAt.getTime() }))
      .sort(compareEntries)
      .map(entry => entry.post)
  );
  const published = (post: Post) => !post.draft;

  return {
    size: byId.size,
    allPublished: () => where(ordered, published),
    byTag: (tag: string) => where(ordered, post => published(post) && post.tags.includes(tag)),
    drafts: () => where(ordered, post => post.draft),
    get: (id: string) => byId.get(id),
    bySlug: (slug: string) => ordered.find(post => published(post) && post.slug === slug),
    tags() {
      const counts = new Map<string, number>();
      for (const post of where(ordered, published)) {
        post.tags.forEach(tag => counts.set(tag, (counts.get(tag) ?? 0) + 1));
      }
      return Array.from(counts.entries())
        .map(([name, count]) => ({ name, count }))
        .sort((a, b) => b.count - a.count || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    },
    replace(post: Post) {
      const next = new Map(byId);
      next.set(post.id, post);
      return createPostIndex(next.values());
    },
  };
}

/** Materialises `posts`, failing when the caller needs at least one. */
export function assertNonEmpty(posts: Iterable<Post>, what = 'index'): Post[] {
  const list = [...posts];
  if (list.length === 0) throw new EmptyIndexError(what);
  return list;
}
