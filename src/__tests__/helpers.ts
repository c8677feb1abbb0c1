import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { vi } from 'vitest';
import type { Logger } from '@/lib/logger';
import { permalinkFor } from '@/lib/filename';
import type { Post } from '@/types/post';

export async function createTempDir(): Promise<string> {
  const tempDir = path.join(tmpdir(), `postpress-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  await fs.mkdir(tempDir, { recursive: true });
  return tempDir;
}

export async function cleanupTempDir(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}

export async function writeFiles(dir: string, files: Record<string, string>): Promise<void> {
  for (const [name, content] of Object.entries(files)) {
    const target = path.join(dir, name);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }
}

export function createTestLogger() {
  return {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
  } satisfies Logger;
}

export function makePost(slug: string, publishDate: string, overrides: Partial<Post> = {}): Post {
  return {
    slug,
    filename: `${publishDate}-${slug}.md`,
    publishDate,
    permalink: permalinkFor(publishDate, slug),
    title: slug,
    tocEnabled: false,
    tocSticky: false,
    extra: {},
    body: '',
    rendered: { html: '', headings: [], codeBlocks: [] },
    ...overrides,
  };
}
