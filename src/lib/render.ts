import { marked } from 'marked';
import type { Post, RenderedPost } from '@/types/post';

const MORE = /<!--\s*more\s*-->/i;

export function excerptOf(post: Post): string | undefined {
  for (const key of ['excerpt', 'description']) {
    const value = post.extra[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
  }
  const divider = post.body.search(MORE);
  return divider === -1 ? undefined : post.body.slice(0, divider).trim() || undefined;
}

export function renderPost(post: Post): RenderedPost {
  const html = marked.parse(post.body, { async: false });
  if (typeof html !== 'string') throw new Error(`${post.id}: markdown renderer returned a promise`);
  return { post, html, excerpt: excerptOf(post) };
}
