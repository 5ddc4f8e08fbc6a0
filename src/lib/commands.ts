import { parseArgs } from 'node:util';
import { getPostIndex } from '@/lib/posts';
import type { Post } from '@/types/post';

export type Output = (line: string) => void;

const options = {
  dir: { type: 'string' },
  tag: { type: 'string' },
  tags: { type: 'boolean', default: false },
  drafts: { type: 'boolean', default: false },
  'skip-invalid': { type: 'boolean', default: false },
} as const;

export function formatPost(post: Post): string {
  return [post.publishedAt.toISOString().slice(0, 10), post.slug, post.title].join('\t');
}

/** One index pass over a content directory; lines go to `out`. */
export async function runIndex(argv: string[], out: Output): Promise<void> {
  const { values } = parseArgs({ args: argv, options, strict: true, allowPositionals: false });
  const index = await getPostIndex({
    dir: values.dir,
    onError: values['skip-invalid'] ? 'skip' : undefined,
  });

  if (values.tags) {
    index.tags().forEach(({ name, count }) => out(`${name}\t${count}`));
    return;
  }
  const { tag } = values;
  let posts: Iterable<Post>;
  if (values.drafts) {
    posts = tag === undefined ? index.drafts() : [...index.drafts()].filter(post => post.tags.includes(tag));
  } else {
    posts = tag === undefined ? index.allPublished() : index.byTag(tag);
  }
  for (const post of posts) out(formatPost(post));
}
