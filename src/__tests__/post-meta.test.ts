import { describe, it, expect } from 'vitest';
import { readPostMeta } from '@/lib/post-meta';
import { InvalidPostMetaError } from '@/lib/errors';

describe('readPostMeta', () => {
  it('should map recognised keys and keep the rest on extra', () => {
    const { meta, titleMissing } = readPostMeta(
      { title: 'Deploy previews', author_name: 'Platform Team', toc: true, toc_sticky: true, layout: 'post' },
      'deploy-previews'
    );

    expect(titleMissing).toBe(false);
    expect(meta).toEqual({
      title: 'Deploy previews',
      authorName: 'Platform Team',
      tocEnabled: true,
      tocSticky: true,
      excerpt: undefined,
      date: undefined,
      extra: { layout: 'post' },
    });
  });

  it('should default flags to false and fall back to the slug for the title', () => {
    const { meta, titleMissing } = readPostMeta({}, 'my-slug');

    expect(titleMissing).toBe(true);
    expect(meta.title).toBe('my-slug');
    expect(meta.tocEnabled).toBe(false);
    expect(meta.tocSticky).toBe(false);
    expect(meta.authorName).toBeUndefined();
  });

  it('should treat empty YAML values as absent', () => {
    const { meta } = readPostMeta({ title: 'T', author_name: null, toc: null }, 't');

    expect(meta.authorName).toBeUndefined();
    expect(meta.tocEnabled).toBe(false);
  });

  it('should stringify numeric titles', () => {
    expect(readPostMeta({ title: 2024 }, 'x').meta.title).toBe('2024');
  });

  it('should normalise a YAML date override', () => {
    const { meta } = readPostMeta({ title: 'T', date: new Date(Date.UTC(2024, 10, 12)) }, 't');

    expect(meta.date).toBe('2024-11-12');
  });

  it('should accept a string date override', () => {
    expect(readPostMeta({ title: 'T', date: '2024-04-23 10:00' }, 't').meta.date).toBe('2024-04-23');
  });

  it('should reject an invalid date override', () => {
    expect(() => readPostMeta({ title: 'T', date: '2024-02-30' }, 't')).toThrow(InvalidPostMetaError);
  });

  it('should reject a date override with trailing text', () => {
    expect(() => readPostMeta({ title: 'T', date: '2024-04-23junk' }, 't')).toThrow(InvalidPostMetaError);
  });

  it('should reject a non-boolean toc flag', () => {
    try {
      readPostMeta({ title: 'T', toc: 'yes' }, 't');
      expect.unreachable('readPostMeta should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidPostMetaError);
      if (error instanceof InvalidPostMetaError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0].startsWith('toc: ')).toBe(true);
      }
    }
  });
});
