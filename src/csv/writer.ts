import { createWriteStream, type WriteStream } from 'node:fs';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { finished } from 'node:stream/promises';

export type CsvRow<TColumn extends string> = Record<TColumn, string | number>;

export class CsvStreamWriter<TColumn extends string> {
  private constructor(
    private readonly header: readonly TColumn[],
    private readonly stream: WriteStream,
  ) {}

  static async create<TColumn extends string>(
    destination: string,
    header: readonly TColumn[],
  ): Promise<CsvStreamWriter<TColumn>> {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    const stream = createWriteStream(destination, { encoding: 'utf8' });
    stream.write(`${header.map(csvEscape).join(',')}\n`);
    return new CsvStreamWriter(header, stream);
  }

  async writeRow(row: CsvRow<TColumn>): Promise<void> {
    const line = this.header.map((key) => csvEscape(String(row[key]))).join(',');
    if (!this.stream.write(`${line}\n`)) {
      await onceDrain(this.stream);
    }
  }

  async close(): Promise<void> {
    this.stream.end();
    await finished(this.stream);
  }
}

async function onceDrain(stream: WriteStream): Promise<void> {
  await new Promise<void>((resolve) => stream.once('drain', resolve));
}

/** Quotes fields holding a comma, quote or line break; line breaks are kept. */
export function csvEscape(value: string): string {
  if (!/[",\r\n]/.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}
