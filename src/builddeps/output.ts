/**
 * Output Writer
 * =============
 *
 * Single open-write-close per run, truncating or appending as chosen up
 * front. No atomic rename: a crash mid-write can leave a partial file.
 */

import { writeFile } from 'node:fs/promises';

/**
 * Where and how to write the report.
 */
export interface WriteTarget {
  /** Output file, or null for stdout */
  outputFile: string | null;
  /** Append instead of truncating */
  append: boolean;
  /** Stdout sink (default: process.stdout) */
  stdout?: (text: string) => void;
}

/**
 * Write the report followed by a newline.
 */
export async function writeReport(content: string, target: WriteTarget): Promise<void> {
  const text = `${content}\n`;

  if (target.outputFile === null) {
    const stdout = target.stdout ?? ((chunk: string) => process.stdout.write(chunk));
    stdout(text);
    return;
  }

  await writeFile(target.outputFile, text, { encoding: 'utf8', flag: target.append ? 'a' : 'w' });
}
