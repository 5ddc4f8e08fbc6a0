export type { ErrorPolicy, FrontMatterKey, ParseOptions, Post, RenderedPost, TagWithCount } from './types/post';
export {
  ConfigError,
  ContentError,
  DuplicatePostError,
  EmptyIndexError,
  IoFailureError,
  MalformedFrontMatterError,
} from './lib/errors';
export { DEFAULT_DELIMITER, parsePost, serializePost, slugFromSource, splitFrontMatter } from './lib/frontmatter';
export type { FrontMatterParts } from './lib/frontmatter';
export { assertNonEmpty, comparePosts, createPostIndex } from './lib/post-index';
export type { PostIndex } from './lib/post-index';
export { getAllPosts, getPostBySlug, getPostIndex, loadPosts } from './lib/posts';
export type { LoadOptions, LoadResult } from './lib/posts';
export { excerptOf, renderPost } from './lib/render';
