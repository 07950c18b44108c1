import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { TraceSink } from '../../simulation/engine/TraceSink.js';
import type { BackoffVariant } from '../types.js';

export function traceFilePath(dir: string, variant: BackoffVariant): string {
  return path.join(dir, `ts_${variant}`);
}

// Buffers commit times in memory and appends them to the variant's file on flush, one integer per line.
export class FileTraceSink implements TraceSink {
  private lines: string[] = [];

  constructor(readonly filePath: string) {}

  record(simTime: number): void {
    this.lines.push(String(Math.floor(simTime)));
  }

  async flush(): Promise<void> {
    if (this.lines.length === 0) return;
    const chunk = `${this.lines.join('\n')}\n`;
    this.lines = [];
    await appendFile(this.filePath, chunk, 'utf8');
  }
}

// Creates the directory and truncates one trace file per variant; returns a sink per variant.
export async function openTraceFiles(
  dir: string,
  variants: readonly BackoffVariant[]
): Promise<Map<BackoffVariant, FileTraceSink>> {
  await mkdir(dir, { recursive: true });
  const sinks = new Map<BackoffVariant, FileTraceSink>();
  for (const variant of variants) {
    const filePath = traceFilePath(dir, variant);
    await writeFile(filePath, '', 'utf8');
    sinks.set(variant, new FileTraceSink(filePath));
  }
  return sinks;
}
