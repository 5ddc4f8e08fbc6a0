import path from 'node:path';
import matter from 'gray-matter';
import { z } from 'zod';
import { MalformedFrontMatterError } from '@/lib/errors';
import type { FrontMatterKey, ParseOptions, Post } from '@/types/post';

export const DEFAULT_DELIMITER = '---';

export type FrontMatterParts = {
  /** Everything up to and including the closing delimiter line. */
  frontMatter: string;
  /** Metadata text between the delimiter lines. */
  matter: string;
  body: string;
};

type Line = { start: number; end: number; text: string };

function* lines(source: string): Generator<Line> {
  let start = 0;
  while (start < source.length) {
    const nl = source.indexOf('\n', start);
    const end = nl === -1 ? source.length : nl + 1;
    yield { start, end, text: source.slice(start, end).replace(/\r?\n$/, '') };
    start = end;
  }
}

/**
 * Splits raw post text on its delimiter lines. A delimiter line holds only the
 * delimiter (trailing whitespace allowed). Slicing keeps the original bytes, so
 * `frontMatter + body === text`.
 */
export function splitFrontMatter(text: string, delimiter = DEFAULT_DELIMITER, source = '<text>'): FrontMatterParts {
  const iter = lines(text);
  const first = iter.next();
  if (first.done || first.value.text.replace(/^\uFEFF/, '').trimEnd() !== delimiter) {
    throw new MalformedFrontMatterError(source, `missing opening "${delimiter}" delimiter`);
  }
  for (const line of iter) {
    if (line.text.trimEnd() === delimiter) {
      return {
        frontMatter: text.slice(0, line.end),
        matter: text.slice(first.value.end, line.start).replace(/\r?\n$/, ''),
        body: text.slice(line.end),
      };
    }
  }
  throw new MalformedFrontMatterError(source, `front matter is not closed by a "${delimiter}" line`);
}

const metaSchema = z.object({
  title: z
    .string({ required_error: 'is required', invalid_type_error: 'must be text' })
    .trim()
    .min(1, 'must not be empty'),
  // YAML timestamps arrive as Date; quoted values as strings
  date: z.preprocess(
    value => (typeof value === 'string' ? new Date(value) : value),
    z.date({ required_error: 'is required', invalid_type_error: 'must be a date' })
  ),
  draft: z.boolean({ invalid_type_error: 'must be true or false' }).default(false),
  tags: z
    .array(z.string({ invalid_type_error: 'must be text' }).trim().min(1, 'must not be empty'), {
      invalid_type_error: 'must be a list of text labels',
    })
    .nullish()
    .transform(tags => [...new Set(tags ?? [])]),
});

function resolveKeys(keys: ParseOptions['keys']): Record<FrontMatterKey, string> {
  return {
    title: keys?.title ?? 'title',
    date: keys?.date ?? 'date',
    draft: keys?.draft ?? 'draft',
    tags: keys?.tags ?? 'tags',
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function readMapping(source: string, block: string, delimiter: string): Record<string, unknown> {
  // gray-matter closes on the first line that starts with its closer, so pick one the block never contains
  let closer = `${delimiter}#`;
  while (`\n${block}`.includes(`\n${closer}`)) closer += '#';
  let data: unknown;
  try {
    data = matter(`${delimiter}\n${block}\n${closer}\n`, { delimiters: [delimiter, closer] }).data;
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new MalformedFrontMatterError(source, 'front matter is not valid YAML', [detail], { cause: err });
  }
  if (!isRecord(data)) {
    throw new MalformedFrontMatterError(source, 'front matter must be a key-value mapping');
  }
  return data;
}

function frozenCopy(value: unknown): unknown {
  if (value instanceof Date) return new Date(value.getTime());
  if (Array.isArray(value)) return Object.freeze(value.map(frozenCopy));
  if (isRecord(value)) {
    return Object.freeze(Object.fromEntries(Object.entries(value).map(([key, item]) => [key, frozenCopy(item)])));
  }
  return value;
}

/** `posts/2021/redis.md` → `redis`; page bundles (`redis/index.md`) take the directory name. */
export function slugFromSource(id: string): string {
  const { dir, name } = path.posix.parse(id);
  if ((name === 'index' || name === '_index') && dir) return path.posix.basename(dir);
  return name;
}

export function parsePost(source: string, text: string, options: ParseOptions = {}): Post {
  const delimiter = options.delimiter ?? DEFAULT_DELIMITER;
  const parts = splitFrontMatter(text, delimiter, source);
  const data = readMapping(source, parts.matter, delimiter);

  const keys = resolveKeys(options.keys);
  const result = metaSchema.safeParse({
    title: data[keys.title],
    date: data[keys.date],
    draft: data[keys.draft],
    tags: data[keys.tags],
  });
  if (!result.success) {
    const names = new Map<string, string>(Object.entries(keys));
    const issues = result.error.issues.map(issue => {
      const [head, ...rest] = issue.path;
      const name = names.get(String(head)) ?? String(head);
      return `${[name, ...rest].join('.')}: ${issue.message}`;
    });
    throw new MalformedFrontMatterError(source, 'invalid front matter', issues);
  }
  const meta = result.data;

  const known = new Set<string>(Object.values(keys));
  const extra: Readonly<Record<string, unknown>> = Object.freeze(
    Object.fromEntries(Object.entries(data).filter(([key]) => !known.has(key)).map(([key, value]) => [key, frozenCopy(value)]))
  );
  const slug = typeof extra.slug === 'string' && extra.slug.trim() ? extra.slug.trim() : slugFromSource(source);

  const time = meta.date.getTime();
  return Object.freeze({
    id: source,
    slug,
    title: meta.title,
    // a fresh Date per read; the stored timestamp cannot be changed through it
    get publishedAt() {
      return new Date(time);
    },
    draft: meta.draft,
    tags: Object.freeze(meta.tags),
    body: parts.body,
    extra,
    frontMatter: parts.frontMatter,
  });
}

/** Inverse of {@link parsePost}: reproduces the source text byte for byte. */
export function serializePost(post: Post): string {
  return post.frontMatter + post.body;
}
