import { describe, it, expect } from 'vitest';
import { parseFrontMatter, stringifyFrontMatter } from '@/lib/front-matter';
import { MalformedFrontMatterError } from '@/lib/errors';

describe('parseFrontMatter', () => {
  it('should return the whole input as body when there is no opening delimiter', () => {
    const raw = '# Hello\n\nNo header here.\n';
    const result = parseFrontMatter(raw);

    expect(result.data).toEqual({});
    expect(result.body).toBe(raw);
  });

  it('should not treat a delimiter after position zero as front matter', () => {
    const raw = '\n---\ntitle: Nope\n---\nBody\n';
    const result = parseFrontMatter(raw);

    expect(result.data).toEqual({});
    expect(result.body).toBe(raw);
  });

  it('should split header and body', () => {
    const result = parseFrontMatter('---\ntitle: Hello\ntoc: true\n---\n# Body\n');

    expect(result.data).toEqual({ title: 'Hello', toc: true });
    expect(result.body).toBe('# Body\n');
  });

  it('should accept an empty header', () => {
    const result = parseFrontMatter('---\n---\nBody\n');

    expect(result.data).toEqual({});
    expect(result.body).toBe('Body\n');
  });

  it('should handle CRLF line endings', () => {
    const result = parseFrontMatter('---\r\ntitle: Hi\r\n---\r\nBody\r\n');

    expect(result.data).toEqual({ title: 'Hi' });
    expect(result.body).toBe('Body\r\n');
  });

  it('should keep a horizontal rule in the body', () => {
    const result = parseFrontMatter('---\ntitle: Rules\n---\nAbove\n\n---\n\nBelow\n');

    expect(result.data).toEqual({ title: 'Rules' });
    expect(result.body).toBe('Above\n\n---\n\nBelow\n');
  });

  it('should throw MalformedFrontMatterError when the header is never closed', () => {
    expect(() => parseFrontMatter('---\ntitle: Oops\n# Body\n')).toThrow(MalformedFrontMatterError);
  });

  it('should throw MalformedFrontMatterError for a lone delimiter', () => {
    expect(() => parseFrontMatter('---')).toThrow(MalformedFrontMatterError);
  });

  it('should throw MalformedFrontMatterError when YAML does not parse', () => {
    expect(() => parseFrontMatter('---\ntitle: [unclosed\n---\nBody\n')).toThrow(MalformedFrontMatterError);
  });

  it('should throw MalformedFrontMatterError when the header is not a mapping', () => {
    expect(() => parseFrontMatter('---\n- a\n- b\n---\nBody\n')).toThrow(MalformedFrontMatterError);
  });
});

describe('stringifyFrontMatter', () => {
  const cases = [
    {
      name: 'body without trailing newline',
      data: { title: 'Hello: world', author_name: 'Platform Team', toc: true, toc_sticky: false },
      body: '# Intro\n\nText',
    },
    {
      name: 'body with trailing newline',
      data: { title: 'Second' },
      body: 'Line one\nLine two\n',
    },
    {
      name: 'empty body',
      data: { title: 'Only a title' },
      body: '',
    },
    {
      name: 'no metadata',
      data: {},
      body: 'Just text\n',
    },
    {
      name: 'no metadata, body opening with a delimiter line',
      data: {},
      body: '---\ntitle: x\n---\nbody\n',
    },
  ];

  for (const { name, data, body } of cases) {
    it(`should round-trip: ${name}`, () => {
      const reparsed = parseFrontMatter(stringifyFrontMatter(data, body));

      expect(reparsed.data).toEqual(data);
      expect(reparsed.body).toBe(body);
    });
  }

  it('should write a --- delimited YAML header', () => {
    expect(stringifyFrontMatter({ title: 'Hi' }, 'Body\n')).toBe('---\ntitle: Hi\n---\nBody\n');
  });
});
