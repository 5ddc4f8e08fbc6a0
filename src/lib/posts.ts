import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { getConfig } from '@/lib/config';
import { ContentError, IoFailureError } from '@/lib/errors';
import { parsePost } from '@/lib/frontmatter';
import { log } from '@/lib/logger';
import { createPostIndex, type PostIndex } from '@/lib/post-index';
import type { ErrorPolicy, ParseOptions, Post } from '@/types/post';

export type LoadOptions = ParseOptions & {
  dir?: string;
  extensions?: readonly string[];
  onError?: ErrorPolicy;
};

export type LoadResult = {
  posts: Post[];
  /** Failures left out under the `skip` policy, in id order. */
  skipped: ContentError[];
};

async function listPostFiles(root: string, extensions: readonly string[]): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(root, { recursive: true });
  } catch (err) {
    throw new IoFailureError(root, err);
  }
  return entries
    .filter(f => extensions.includes(path.extname(f).toLowerCase()))
    .map(f => f.split(path.sep).join('/'))
    .sort();
}

async function readPost(root: string, id: string, options: ParseOptions): Promise<Post> {
  let raw: string;
  try {
    raw = await readFile(path.join(root, id), 'utf8');
  } catch (err) {
    throw new IoFailureError(id, err);
  }
  return parsePost(id, raw, options);
}

export async function loadPosts(options: LoadOptions = {}): Promise<LoadResult> {
  const config = getConfig();
  const root = path.resolve(options.dir ?? config.contentDir);
  const extensions = options.extensions ?? config.extensions;
  const onError = options.onError ?? config.onError;
  const parseOptions: ParseOptions = { delimiter: options.delimiter ?? config.delimiter, keys: options.keys };

  const ids = await listPostFiles(root, extensions);
  const results = await Promise.all(
    ids.map(id =>
      readPost(root, id, parseOptions).then(
        post => ({ ok: true as const, post }),
        (error: unknown) => ({ ok: false as const, error })
      )
    )
  );

  const posts: Post[] = [];
  const skipped: ContentError[] = [];
  for (const result of results) {
    if (result.ok) {
      posts.push(result.post);
      continue;
    }
    if (onError === 'abort' || !(result.error instanceof ContentError)) throw result.error;
    log.warn(`Skipping ${result.error.source}`, { error: result.error.name, reason: result.error.message });
    skipped.push(result.error);
  }
  log.debug('Loaded posts', { dir: root, posts: posts.length, skipped: skipped.length });
  return { posts, skipped };
}

export async function getPostIndex(options?: LoadOptions): Promise<PostIndex> {
  const { posts } = await loadPosts(options);
  return createPostIndex(posts);
}

export async function getAllPosts(options?: LoadOptions): Promise<Post[]> {
  const index = await getPostIndex(options);
  return [...index.allPublished()];
}

export async function getPostBySlug(slug: string, options?: LoadOptions): Promise<Post | undefined> {
  const index = await getPostIndex(options);
  return index.bySlug(slug);
}
