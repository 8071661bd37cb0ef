import { promises as fs } from 'node:fs';
import path from 'node:path';
import { isErrnoException } from '../errors.js';
import { fileStamp } from '../utils/time.js';

const MAX_SUFFIX = 1000;

/**
 * Writes `content` to `<dir>/<prefix>_<stamp>.<extension>`. The file is
 * created exclusively: when the name is taken a `_2`, `_3`, … suffix is
 * appended instead of overwriting.
 */
export async function writeTimestampedFile(
  outputDir: string,
  prefix: string,
  extension: string,
  content: string,
  generatedAt: Date,
): Promise<string> {
  await fs.mkdir(outputDir, { recursive: true });
  const base = `${prefix}_${fileStamp(generatedAt)}`;

  for (let attempt = 1; attempt <= MAX_SUFFIX; attempt += 1) {
    const name = attempt === 1 ? `${base}.${extension}` : `${base}_${attempt}.${extension}`;
    const target = path.join(outputDir, name);
    try {
      await fs.writeFile(target, content, { encoding: 'utf8', flag: 'wx' });
      return target;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        continue;
      }
      throw error;
    }
  }

  throw new Error(`Unable to find a free file name for ${base}.${extension} in ${outputDir}`);
}
