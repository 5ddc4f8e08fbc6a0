import { describe, it, expect } from 'vitest';
import { MalformedFrontMatterError } from '@/lib/errors';
import { parsePost, serializePost, slugFromSource, splitFrontMatter } from '@/lib/frontmatter';
import type { ParseOptions } from '@/types/post';

const SAMPLE = [
  '---',
  'title: Reactive Redis with Lettuce',
  'date: 2021-04-24',
  'tags: [java, redis]',
  'series: redis',
  '---',
  'Lettuce is a Redis client.',
  '',
].join('\n');

function parseError(text: string, options?: ParseOptions): MalformedFrontMatterError {
  try {
    parsePost('posts/x.md', text, options);
  } catch (err) {
    if (err instanceof MalformedFrontMatterError) return err;
    throw err;
  }
  throw new Error('expected parsePost to fail');
}

describe('splitFrontMatter', () => {
  it('separates the metadata block from the body', () => {
    const parts = splitFrontMatter(SAMPLE);
    expect(parts.matter).toBe('title: Reactive Redis with Lettuce\ndate: 2021-04-24\ntags: [java, redis]\nseries: redis');
    expect(parts.body).toBe('Lettuce is a Redis client.\n');
    expect(parts.frontMatter + parts.body).toBe(SAMPLE);
  });

  it('only closes on a line holding just the delimiter', () => {
    const err = parseError('---\ntitle: A\ndate: 2021-01-01\n----\nbody\n');
    expect(err.reason).toBe('front matter is not closed by a "---" line');
  });

  it('accepts trailing whitespace after a delimiter', () => {
    const parts = splitFrontMatter('--- \ntitle: A\n---  \nbody');
    expect(parts.matter).toBe('title: A');
    expect(parts.body).toBe('body');
  });
});

describe('parsePost', () => {
  it('builds a post from front matter and body', () => {
    const post = parsePost('posts/lettuce.md', SAMPLE);
    expect(post.id).toBe('posts/lettuce.md');
    expect(post.slug).toBe('lettuce');
    expect(post.title).toBe('Reactive Redis with Lettuce');
    expect(post.publishedAt.toISOString()).toBe('2021-04-24T00:00:00.000Z');
    expect(post.draft).toBe(false);
    expect(post.tags).toEqual(['java', 'redis']);
    expect(post.extra).toEqual({ series: 'redis' });
    expect(post.body).toBe('Lettuce is a Redis client.\n');
  });

  it('returns frozen values', () => {
    const post = parsePost('posts/lettuce.md', SAMPLE);
    expect(Object.isFrozen(post)).toBe(true);
    expect(Object.isFrozen(post.tags)).toBe(true);
    expect(Object.isFrozen(post.extra)).toBe(true);
  });

  it('hands out a fresh publishedAt on every read', () => {
    const post = parsePost('a.md', SAMPLE);
    post.publishedAt.setUTCFullYear(2030);
    expect(post.publishedAt.toISOString()).toBe('2021-04-24T00:00:00.000Z');
    expect(post.publishedAt).not.toBe(post.publishedAt);
  });

  it('freezes nested front matter values', () => {
    const post = parsePost('a.md', '---\ntitle: A\ndate: 2021-01-01\ncategories: [x]\nauthor:\n  name: Kim\n---\n');
    const categories = post.extra.categories;
    if (!Array.isArray(categories)) throw new Error('expected categories to be a list');
    expect(() => categories.push('y')).toThrow(TypeError);
    expect(Object.isFrozen(post.extra.author)).toBe(true);
    expect(post.extra).toEqual({ categories: ['x'], author: { name: 'Kim' } });
  });

  it('keeps keys that follow a line starting with the delimiter', () => {
    const post = parsePost('a.md', '---\ntitle: T\n---y: 1\ndate: 2021-01-01\n---\n');
    expect(post.title).toBe('T');
    expect(post.publishedAt.toISOString()).toBe('2021-01-01T00:00:00.000Z');
    expect(post.extra).toEqual({ '---y': 1 });
  });

  it('parses quoted ISO timestamps', () => {
    const post = parsePost('a.md', '---\ntitle: A\ndate: "2021-04-25T09:30:00Z"\n---\n');
    expect(post.publishedAt.toISOString()).toBe('2021-04-25T09:30:00.000Z');
  });

  it('defaults draft to false and tags to empty', () => {
    const post = parsePost('a.md', '---\ntitle: A\ndate: 2021-01-01\ntags:\n---\n');
    expect(post.draft).toBe(false);
    expect(post.tags).toEqual([]);
  });

  it('collapses duplicate tags', () => {
    const post = parsePost('a.md', '---\ntitle: A\ndate: 2021-01-01\ntags: [java, java, redis]\n---\n');
    expect(post.tags).toEqual(['java', 'redis']);
  });

  it('reads the draft flag', () => {
    const post = parsePost('a.md', '---\ntitle: A\ndate: 2021-01-01\ndraft: true\n---\n');
    expect(post.draft).toBe(true);
  });

  it('takes the slug from front matter when present', () => {
    const post = parsePost('posts/a.md', '---\ntitle: A\ndate: 2021-01-01\nslug: custom-slug\n---\n');
    expect(post.slug).toBe('custom-slug');
    expect(post.extra).toEqual({ slug: 'custom-slug' });
  });

  it('honours custom key names', () => {
    const text = '---\ntitle: A\npubDate: 2020-02-03\ncategories: [notes]\nlayout: post\n---\nbody\n';
    const post = parsePost('a.md', text, { keys: { date: 'pubDate', tags: 'categories' } });
    expect(post.publishedAt.toISOString()).toBe('2020-02-03T00:00:00.000Z');
    expect(post.tags).toEqual(['notes']);
    expect(post.extra).toEqual({ layout: 'post' });
  });

  it('honours a custom delimiter', () => {
    const post = parsePost('a.md', '+++\ntitle: A\ndate: 2021-01-01\n+++\nBody\n', { delimiter: '+++' });
    expect(post.title).toBe('A');
    expect(post.body).toBe('Body\n');
  });
});

describe('round trip', () => {
  it.each([
    ['lf', SAMPLE],
    ['crlf', '---\r\ntitle: A\r\ndate: 2021-01-02\r\n---\r\nBody\r\n'],
    ['byte order mark', '\uFEFF---\ntitle: A\ndate: 2021-01-02\n---\nBody'],
    ['empty body', '---\ntitle: A\ndate: 2021-01-02\n---'],
    ['body with rules', '---\ntitle: A\ndate: 2021-01-02\n---\n\nabove\n\n---\n\nbelow\n'],
  ])('reproduces %s input byte for byte', (_name, text) => {
    expect(serializePost(parsePost('a.md', text))).toBe(text);
  });

  it('keeps later delimiter lines in the body', () => {
    const post = parsePost('a.md', '---\ntitle: A\ndate: 2021-01-02\n---\n\nabove\n\n---\n\nbelow\n');
    expect(post.body).toBe('\nabove\n\n---\n\nbelow\n');
  });
});

describe('malformed front matter', () => {
  it('rejects a missing opening delimiter', () => {
    const err = parseError('title: A\n---\nbody\n');
    expect(err.reason).toBe('missing opening "---" delimiter');
    expect(err.source).toBe('posts/x.md');
    expect(err.message).toBe('posts/x.md: missing opening "---" delimiter');
  });

  it('rejects an unclosed block', () => {
    const err = parseError('---\ntitle: A\ndate: 2021-01-01\nbody\n');
    expect(err.reason).toBe('front matter is not closed by a "---" line');
  });

  it('rejects an empty file', () => {
    expect(parseError('').reason).toBe('missing opening "---" delimiter');
  });

  it('requires a title', () => {
    const err = parseError('---\ndate: 2021-01-01\n---\n');
    expect(err.issues).toEqual(['title: is required']);
  });

  it('rejects a blank title', () => {
    const err = parseError('---\ntitle: "  "\ndate: 2021-01-01\n---\n');
    expect(err.issues).toEqual(['title: must not be empty']);
  });

  it('requires a date', () => {
    const err = parseError('---\ntitle: A\n---\n');
    expect(err.issues).toHaveLength(1);
    expect(err.issues[0]).toMatch(/^date: /);
  });

  it('rejects a date that is not a calendar timestamp', () => {
    const err = parseError('---\ntitle: A\ndate: someday\n---\n');
    expect(err.issues).toEqual(['date: Invalid date']);
  });

  it('rejects a non-boolean draft flag', () => {
    const err = parseError('---\ntitle: A\ndate: 2021-01-01\ndraft: maybe\n---\n');
    expect(err.issues).toEqual(['draft: must be true or false']);
  });

  it('rejects scalar tags', () => {
    const err = parseError('---\ntitle: A\ndate: 2021-01-01\ntags: java\n---\n');
    expect(err.issues).toEqual(['tags: must be a list of text labels']);
  });

  it('reports custom key names in issues', () => {
    const err = parseError('---\ntitle: A\n---\n', { keys: { date: 'pubDate' } });
    expect(err.issues[0]).toMatch(/^pubDate: /);
  });

  it('rejects invalid YAML', () => {
    const err = parseError('---\ntitle: [unclosed\ndate: 2021-01-01\n---\n');
    expect(err.reason).toBe('front matter is not valid YAML');
    expect(err.cause).toBeInstanceOf(Error);
  });

  it('rejects a block that is not a mapping', () => {
    expect(parseError('---\njust some text\n---\n').reason).toBe('front matter must be a key-value mapping');
  });
});

describe('slugFromSource', () => {
  it('uses the file name without extension', () => {
    expect(slugFromSource('posts/2021/redis.md')).toBe('redis');
  });

  it('uses the directory name for page bundles', () => {
    expect(slugFromSource('redis/index.md')).toBe('redis');
    expect(slugFromSource('notes/_index.md')).toBe('notes');
  });

  it('keeps a top-level index as is', () => {
    expect(slugFromSource('index.md')).toBe('index');
  });
});
