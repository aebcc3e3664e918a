import { join } from 'node:path';

import type { FetchedPage } from '../fetcher/index.js';
import { writeTextFile } from './utils.js';

/**
 * Make a filename component safe on common file systems.
 */
export function sanitizeFilename(name: string): string {
  const sanitized = name
    .replace(/[<>:"|?*\\]/g, '_')
    .replace(/\0/g, '')
    .replace(/\.{2,}/g, '.')
    .trim();
  return sanitized.length > 200 ? sanitized.substring(0, 200) : sanitized;
}

/**
 * Prepend a YAML front matter block to `markdown`.
 */
export function addFrontMatter(markdown: string, metadata: Record<string, string>): string {
  const lines = ['---'];
  for (const [key, value] of Object.entries(metadata)) {
    lines.push(`${key}: ${value}`);
  }
  lines.push('---', '');
  return lines.join('\n') + markdown;
}

/**
 * Flat file name for a page URL: host and path joined with underscores.
 * Query and fragment are ignored, so URLs differing only there share a file.
 *
 * - `https://example.com/` -> `example.com_index.md`
 * - `https://example.com/docs/` -> `example.com_docs_index.md`
 * - `https://example.com/docs/api` -> `example.com_docs_api.md`
 */
export function pageFileName(url: string): string {
  const { host, pathname } = new URL(url);
  let rel = pathname.replace(/^\/+/, '');
  if (rel === '' || rel.endsWith('/')) {
    rel += 'index';
  }
  return sanitizeFilename(`${host}_${rel.replace(/\//g, '_')}`) + '.md';
}

/**
 * Writes captured pages as Markdown files, all in one directory.
 */
export class MarkdownWriter {
  constructor(private readonly outputDir: string) {}

  urlToFilePath(url: string): string {
    return join(this.outputDir, pageFileName(url));
  }

  /**
   * @returns The path that was written
   */
  async writePage(page: FetchedPage, markdown: string): Promise<string> {
    const content = addFrontMatter(markdown, {
      source: page.url,
      fetchedAt: page.fetchedAt.toISOString(),
    });
    return writeTextFile(this.urlToFilePath(page.url), content);
  }
}
