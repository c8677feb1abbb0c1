import { z } from 'zod';
import { InvalidPostMetaError } from '@/lib/errors';
import { formatPublishDate, parsePublishDate } from '@/lib/filename';
import type { FrontMatterData, PostMeta } from '@/types/post';

const KNOWN_KEYS = ['title', 'author_name', 'toc', 'toc_sticky', 'excerpt', 'date'];

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v === null || v === undefined || v === '' ? undefined : String(v)));

const flag = z
  .boolean()
  .nullish()
  .transform((v) => v ?? false);

// YAML turns bare `2024-04-23` into a Date; quoted dates stay strings.
const dateOverride = z
  .union([z.date(), z.string()])
  .nullish()
  .transform((v, ctx) => {
    if (v === null || v === undefined) return undefined;
    const parsed =
      v instanceof Date
        ? Number.isNaN(v.getTime())
          ? null
          : { year: v.getUTCFullYear(), month: v.getUTCMonth() + 1, day: v.getUTCDate() }
        : parsePublishDate(v);
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a YYYY-MM-DD calendar date' });
      return z.NEVER;
    }
    return formatPublishDate(parsed);
  });

const postMetaSchema = z.object({
  title: optionalText,
  author_name: optionalText,
  toc: flag,
  toc_sticky: flag,
  excerpt: optionalText,
  date: dateOverride,
});

export interface ReadPostMetaResult {
  meta: PostMeta;
  titleMissing: boolean;
}

/**
 * Validate a front-matter mapping. A missing title falls back to
 * `fallbackTitle` and is reported through `titleMissing`.
 */
export function readPostMeta(data: FrontMatterData, fallbackTitle: string): ReadPostMetaResult {
  const result = postMetaSchema.safeParse(data);
  if (!result.success) {
    throw new InvalidPostMetaError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const extra: FrontMatterData = {};
  for (const [key, value] of Object.entries(data)) {
    if (!KNOWN_KEYS.includes(key)) extra[key] = value;
  }

  const { title, author_name, toc, toc_sticky, excerpt, date } = result.data;
  return {
    meta: {
      title: title ?? fallbackTitle,
      authorName: author_name,
      tocEnabled: toc,
      tocSticky: toc_sticky,
      excerpt,
      date,
      extra,
    },
    titleMissing: title === undefined,
  };
}
