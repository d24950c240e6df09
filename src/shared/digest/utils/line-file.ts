import fs from 'fs';
import path from 'path';

/**
 * Non-empty trimmed lines of a text file. A missing file reads as empty.
 */
export async function readLines(filePath: string): Promise<string[]> {
  if (!fs.existsSync(filePath)) return [];

  const content = await fs.promises.readFile(filePath, 'utf-8');
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export async function appendLines(
  filePath: string,
  lines: string[],
): Promise<void> {
  if (lines.length === 0) return;

  const directory = path.dirname(filePath);
  await fs.promises.mkdir(directory, { recursive: true });
  await fs.promises.appendFile(
    filePath,
    lines.map((line) => `${line}\n`).join(''),
    'utf-8',
  );
}
