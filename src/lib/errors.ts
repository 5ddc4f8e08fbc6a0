/** Base class for every failure raised while loading content. */
export class ContentError extends Error {
  readonly source: string;

  constructor(source: string, message: string, options?: ErrorOptions) {
    super(`${source}: ${message}`, options);
    this.name = 'ContentError';
    this.source = source;
  }
}

export class MalformedFrontMatterError extends ContentError {
  readonly reason: string;
  readonly issues: readonly string[];

  constructor(source: string, reason: string, issues: readonly string[] = [], options?: ErrorOptions) {
    super(source, issues.length ? `${reason} (${issues.join('; ')})` : reason, options);
    this.name = 'MalformedFrontMatterError';
    this.reason = reason;
    this.issues = issues;
  }
}

export class IoFailureError extends ContentError {
  constructor(source: string, cause: unknown) {
    super(source, `could not be read: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'IoFailureError';
  }
}

export class DuplicatePostError extends ContentError {
  constructor(source: string) {
    super(source, 'more than one post has this id');
    this.name = 'DuplicatePostError';
  }
}

/** `source` names the sequence that came back empty. */
export class EmptyIndexError extends ContentError {
  constructor(what: string) {
    super(what, 'expected at least one post');
    this.name = 'EmptyIndexError';
  }
}

export class ConfigError extends ContentError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('environment', `invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
