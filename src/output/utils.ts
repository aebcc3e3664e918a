import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Write `content` to `filePath`, creating parent directories as needed.
 *
 * @returns The path that was written
 */
export async function writeTextFile(filePath: string, content: string): Promise<string> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, content, 'utf-8');
  return filePath;
}

/**
 * Quote a string as a Graphviz DOT identifier.
 */
export function quoteDotId(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\r?\n/g, '\\n');
  return `"${escaped}"`;
}
