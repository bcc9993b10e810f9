import { promises as fs } from 'fs';
import { dirname, join } from 'path';
import type { ZodType, ZodTypeDef } from 'zod';
import { AbsentError, CorruptError, IOError, describeError } from './errors.js';

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * File-backed cache of named JSON documents
 *
 * load() rejects with AbsentError, CorruptError or IOError so callers can
 * pick a fallback per outcome.
 */
export class LocalCache {
  private directory: string;

  constructor(directory: string) {
    this.directory = directory;
  }

  pathOf(name: string): string {
    return join(this.directory, name);
  }

  async load<T>(name: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    const filePath = this.pathOf(name);

    let data: string;
    try {
      data = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        throw new AbsentError(`${filePath} does not exist`, { cause: error });
      }
      throw new IOError(`Failed to read ${filePath}: ${describeError(error)}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      throw new CorruptError(`${filePath} is not valid JSON`, { cause: error });
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new CorruptError(`${filePath} has an unexpected shape: ${result.error.message}`, { cause: result.error });
    }
    return result.data;
  }

  /**
   * Overwrite the document (truncate and write)
   */
  async store<T>(name: string, value: T): Promise<void> {
    const filePath = this.pathOf(name);
    try {
      await fs.mkdir(dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, JSON.stringify(value, null, 2), 'utf-8');
    } catch (error) {
      throw new IOError(`Failed to write ${filePath}: ${describeError(error)}`, { cause: error });
    }
  }

  async remove(name: string): Promise<void> {
    const filePath = this.pathOf(name);
    try {
      await fs.rm(filePath, { force: true });
    } catch (error) {
      throw new IOError(`Failed to remove ${filePath}: ${describeError(error)}`, { cause: error });
    }
  }
}
