import fs from 'node:fs/promises';
import path from 'node:path';

// Write a UTF-8 file, creating its parent directories first.
export async function writeFile(filePath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, contents, 'utf8');
  console.log(`wrote file: ${filePath}`);
}
