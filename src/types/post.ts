export type Post = Readonly<{
  /** Path relative to the content root, `/`-separated. Unique per index. */
  id: string;
  slug: string;
  title: string;
  publishedAt: Date;
  draft: boolean;
  tags: readonly string[];
  body: string; // markdown, exactly as it follows the closing delimiter
  /** Front-matter keys the core does not recognise, passed through untouched. */
  extra: Readonly<Record<string, unknown>>;
  frontMatter: string; // raw block, delimiter lines included
}>;

export type FrontMatterKey = 'title' | 'date' | 'draft' | 'tags';

export type ParseOptions = {
  delimiter?: string;
  keys?: Partial<Record<FrontMatterKey, string>>;
};

export type ErrorPolicy = 'abort' | 'skip';

export interface TagWithCount {
  name: string;
  count: number;
}

export type RenderedPost = {
  post: Post;
  html: string;
  excerpt?: string;
};
