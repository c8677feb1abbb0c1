/**
 * Error taxonomy for the publishing pipeline. Per-post errors are caught at the
 * loader boundary; only config and directory errors reach the CLI.
 */

export type PostpressErrorCode =
  | 'MALFORMED_FRONT_MATTER'
  | 'UNRECOGNIZED_FILENAME'
  | 'INVALID_POST_META'
  | 'NOT_FOUND'
  | 'CONFIG';

export class PostpressError extends Error {
  code: PostpressErrorCode;

  constructor(message: string, code: PostpressErrorCode) {
    super(message);
    this.name = 'PostpressError';
    this.code = code;
  }
}

/** Opening `---` delimiter without a closing one, or a block that is not a mapping. */
export class MalformedFrontMatterError extends PostpressError {
  constructor(reason: string) {
    super(`Malformed front matter: ${reason}`, 'MALFORMED_FRONT_MATTER');
    this.name = 'MalformedFrontMatterError';
  }
}

export class UnrecognizedFilenameError extends PostpressError {
  filename: string;

  constructor(filename: string, reason = 'expected YYYY-MM-DD-slug.md') {
    super(`Unrecognized post filename "${filename}": ${reason}`, 'UNRECOGNIZED_FILENAME');
    this.name = 'UnrecognizedFilenameError';
    this.filename = filename;
  }
}

export class InvalidPostMetaError extends PostpressError {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid front matter: ${issues.join('; ')}`, 'INVALID_POST_META');
    this.name = 'InvalidPostMetaError';
    this.issues = issues;
  }
}

export class PostNotFoundError extends PostpressError {
  slug: string;

  constructor(slug: string) {
    super(`Post not found: ${slug}`, 'NOT_FOUND');
    this.name = 'PostNotFoundError';
    this.slug = slug;
  }
}

export class ConfigError extends PostpressError {
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}\n  ${issues.join('\n  ')}` : message, 'CONFIG');
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
