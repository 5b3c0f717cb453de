/**
 * Base class for file-backed stores
 * Handles reading, error mapping, atomic writes and the connected state
 */

import { randomUUID } from 'node:crypto';
import { readFile, rename, rm, writeFile } from 'node:fs/promises';
import { CollaboratorError, wrapError } from '@snowmatch/core';

export type StoreState = 'disconnected' | 'connecting' | 'connected' | 'error';

export interface FileStoreConfig {
  /** Name used in errors and logs */
  id: string;
  /** Path to the file */
  filePath: string;
  /** Character encoding (default: utf-8) */
  encoding?: BufferEncoding;
}

function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Write beside the target and rename over it, so readers see either the
 * old or the new content.
 */
export async function writeFileAtomic(
  filePath: string,
  content: string,
  collaborator: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  const tempPath = `${filePath}.${randomUUID()}.tmp`;
  try {
    await writeFile(tempPath, content, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw wrapError(error, {
      code: 'WRITE_FAILED',
      prefix: `Failed to write ${filePath}`,
      collaborator,
    });
  }
}

export abstract class BaseFileStore<TConfig extends FileStoreConfig> {
  readonly config: TConfig;
  protected _state: StoreState = 'disconnected';

  constructor(config: TConfig) {
    this.config = config;
  }

  get state(): StoreState {
    return this._state;
  }

  /**
   * Read and parse the file. Subclasses that tolerate a missing file
   * override `allowMissingFile`.
   */
  async connect(): Promise<void> {
    this._state = 'connecting';

    try {
      const content = await this.readContent();
      await this.parseContent(content);
      this._state = 'connected';
    } catch (error) {
      this._state = 'error';

      if (error instanceof CollaboratorError) throw error;

      const code = errnoCode(error);
      if (code === 'ENOENT') {
        throw new CollaboratorError({
          code: 'NOT_FOUND',
          message: `File not found: ${this.config.filePath}`,
          collaborator: this.config.id,
          suggestion: 'Check that the file path is correct and the file exists.',
        });
      }

      if (code === 'EACCES') {
        throw new CollaboratorError({
          code: 'READ_FAILED',
          message: `Cannot read file: ${this.config.filePath}`,
          collaborator: this.config.id,
          suggestion: 'Check file permissions.',
        });
      }

      throw wrapError(error, {
        code: 'READ_FAILED',
        prefix: 'Failed to read file',
        collaborator: this.config.id,
      });
    }
  }

  async disconnect(): Promise<void> {
    this._state = 'disconnected';
  }

  protected ensureConnected(): void {
    if (this._state !== 'connected') {
      throw new CollaboratorError({
        code: 'CONNECTION_FAILED',
        message: `Store '${this.config.id}' is not connected`,
        collaborator: this.config.id,
        suggestion: 'Call connect() before performing operations.',
      });
    }
  }

  protected allowMissingFile(): boolean {
    return false;
  }

  protected async persist(content: string): Promise<void> {
    await writeFileAtomic(this.config.filePath, content, this.config.id, this.config.encoding);
  }

  private async readContent(): Promise<string> {
    try {
      const content = await readFile(this.config.filePath, this.config.encoding ?? 'utf-8');
      return content.replace(/^\uFEFF/, '');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT' && this.allowMissingFile()) return '';
      throw error;
    }
  }

  /**
   * Load the file content into the store (implemented by subclasses)
   */
  protected abstract parseContent(content: string): Promise<void>;
}
