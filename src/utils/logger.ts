import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

function nowIso(): string {
  return new Date().toISOString();
}

/** Key/value pairs stamped on every line of a run, such as the posting URL. */
export type LogContext = Record<string, string | undefined>;

function formatContext(context: LogContext): string {
  const pairs = Object.entries(context)
    .filter(([, value]) => value !== undefined && value !== '')
    .map(([key, value]) => `${key}=${value}`);
  return pairs.length > 0 ? `[${pairs.join(' ')}] ` : '';
}

export interface Logger {
  info(message: string): Promise<void>;
  warn(message: string): Promise<void>;
  error(message: string): Promise<void>;
}

export class RunLogger implements Logger {
  private readonly prefix: string;

  constructor(
    private readonly filePath: string,
    private readonly runLabel = 'Extraction run',
    context: LogContext = {},
  ) {
    this.prefix = formatContext(context);
  }

  async init(): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, '', { encoding: 'utf8', flag: 'a' });
    await this.write(`=== ${this.runLabel} started ${nowIso()} ===`);
  }

  async info(message: string): Promise<void> {
    await this.write(`[INFO] ${this.prefix}${message}`);
  }

  async warn(message: string): Promise<void> {
    await this.write(`[WARN] ${this.prefix}${message}`);
  }

  async error(message: string): Promise<void> {
    await this.write(`[ERROR] ${this.prefix}${message}`);
  }

  async close(): Promise<void> {
    await this.write(`=== ${this.runLabel} finished ${nowIso()} ===`);
  }

  private async write(message: string): Promise<void> {
    await appendFile(this.filePath, `${nowIso()} ${message}\n`, 'utf8');
  }
}
