import matter from 'gray-matter';
import { MalformedFrontMatterError, errorMessage } from '@/lib/errors';
import type { FrontMatterData } from '@/types/post';

export interface ParsedDocument {
  data: FrontMatterData;
  body: string;
}

const OPENING_LINE = /^---[ \t]*(?:\r?\n|$)/;
const CLOSING_LINE = /\r?\n---[ \t]*(?:\r?\n|$)/;

/**
 * Split a post into its YAML header and Markdown body.
 *
 * Text that does not start with a `---` line is all body. An opening line
 * without a matching closing line throws {@link MalformedFrontMatterError}.
 */
export function parseFrontMatter(raw: string): ParsedDocument {
  const opening = OPENING_LINE.exec(raw);
  if (!opening) return { data: {}, body: raw };

  // The closing search starts on the opening line's own newline so that an
  // empty block (`---\n---\n`) is recognised.
  const searchFrom = opening[0].endsWith('\n') ? opening[0].length - 1 : opening[0].length;
  const closing = CLOSING_LINE.exec(raw.slice(searchFrom));
  if (!closing) {
    throw new MalformedFrontMatterError('opening "---" has no closing "---" line');
  }
  const headerEnd = searchFrom + closing.index + closing[0].length;

  let data: unknown;
  try {
    // options bypass gray-matter's per-string cache, which shares `data` objects
    data = matter(raw.slice(0, headerEnd), {}).data;
  } catch (error) {
    throw new MalformedFrontMatterError(errorMessage(error));
  }
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new MalformedFrontMatterError('header is not a key/value mapping');
  }

  return { data: { ...data }, body: raw.slice(headerEnd) };
}

/**
 * Inverse of {@link parseFrontMatter}: `parseFrontMatter(stringifyFrontMatter(d, b))`
 * gives back `d` and `b`.
 */
export function stringifyFrontMatter(data: FrontMatterData, body: string): string {
  // gray-matter writes no header for an empty mapping, which would let a body
  // starting with `---` be read back as front matter
  if (Object.keys(data).length === 0 && OPENING_LINE.test(body)) {
    return `---\n---\n${body}`;
  }
  const out = matter.stringify(body, data);
  // gray-matter always terminates the body with a newline
  return body.endsWith('\n') ? out : out.slice(0, -1);
}
