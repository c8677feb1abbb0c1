import { UnrecognizedFilenameError } from '@/lib/errors';

export type PublishDate = { year: number; month: number; day: number };

export type ResolvedFilename = {
  filename: string;
  date: PublishDate;
  slug: string;
};

const POST_FILENAME = /^(\d{4})-(\d{2})-(\d{2})-(.+)\.md$/;
// a bare date, or one followed by a time part
const DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})(?:[T ]|$)/;

function toPublishDate(year: number, month: number, day: number): PublishDate | null {
  if (month < 1 || month > 12 || day < 1) return null;
  // day 0 of the following month is the last day of this one; setUTCFullYear
  // because Date.UTC reads years 0-99 as 1900-1999
  const last = new Date(0);
  last.setUTCFullYear(year, month, 0);
  const daysInMonth = last.getUTCDate();
  if (day > daysInMonth) return null;
  return { year, month, day };
}

/**
 * Parse `YYYY-MM-DD`, optionally followed by a `T` or space and a time. Returns
 * null for anything else and for dates that are not on the calendar.
 */
export function parsePublishDate(value: string): PublishDate | null {
  const m = DATE_PREFIX.exec(value);
  if (!m) return null;
  return toPublishDate(Number(m[1]), Number(m[2]), Number(m[3]));
}

export function formatPublishDate({ year, month, day }: PublishDate): string {
  const pad = (n: number, width: number) => String(n).padStart(width, '0');
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

/**
 * Resolve date and slug from `YYYY-MM-DD-slug.md`.
 */
export function resolveFilename(filename: string): ResolvedFilename {
  const m = POST_FILENAME.exec(filename);
  if (!m) throw new UnrecognizedFilenameError(filename);

  const date = toPublishDate(Number(m[1]), Number(m[2]), Number(m[3]));
  if (!date) throw new UnrecognizedFilenameError(filename, 'prefix is not a valid calendar date');

  return { filename, date, slug: m[4] };
}

/** Date-based route for a post, e.g. `/2024/11/12/my-post/`. */
export function permalinkFor(publishDate: string, slug: string): string {
  return `/${publishDate.replace(/-/g, '/')}/${encodeURIComponent(slug)}/`;
}
