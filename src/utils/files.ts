import { promises as fs } from 'fs';
import path from 'path';
import { logger } from './logger';

export async function ensureDirectory(dir: string): Promise<void> {
  try {
    await fs.access(dir);
  } catch {
    await fs.mkdir(dir, { recursive: true });
    logger.info(`Created ${dir} directory`);
  }
}

/**
 * A single JSON document on disk. Writes go to a temp file first and are
 * renamed into place; concurrent saves are chained so the last one wins.
 */
export class JsonFileStore<T> {
  private pending: Promise<void> = Promise.resolve();

  constructor(
    readonly filePath: string,
    private readonly decode: (raw: unknown) => T,
    private readonly empty: () => T
  ) {}

  async load(): Promise<T> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return this.empty();
      throw error;
    }

    try {
      return this.decode(JSON.parse(text));
    } catch (error) {
      logger.error(`Failed to parse ${this.filePath}, starting empty:`, error);
      return this.empty();
    }
  }

  save(value: T): Promise<void> {
    const text = JSON.stringify(value, null, 2);
    const write = async () => {
      await ensureDirectory(path.dirname(this.filePath));
      const tmp = `${this.filePath}.tmp`;
      await fs.writeFile(tmp, text, 'utf8');
      await fs.rename(tmp, this.filePath);
    };
    this.pending = this.pending.catch(() => undefined).then(write);
    return this.pending;
  }
}

function isMissingFile(error: unknown): boolean {
  // fs errors fail `instanceof Error` under Jest's VM contexts
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
