/**
 * NDJSON Modifier Registry
 *
 * One OptionModifierRecord per line. A missing file is an empty
 * registry. Every upsert rewrites the file; writes go through one queue
 * so concurrent upserts never interleave.
 */

import { CollaboratorError, WriteQueue, deepClone, parseOptionModifierRecord } from '@snowmatch/core';
import type { ModifierRegistry, ModifierScope, OptionModifierRecord } from '@snowmatch/core';
import { mergeModifierRecords, pickModifier, registryKey } from '@snowmatch/reconciliation';
import { BaseFileStore } from './base-file-store.js';
import type { FileStoreConfig } from './base-file-store.js';

export type NdjsonModifierRegistryConfig = FileStoreConfig;

export class NdjsonModifierRegistry extends BaseFileStore<NdjsonModifierRegistryConfig> implements ModifierRegistry {
  private readonly entries = new Map<string, OptionModifierRecord>();
  private readonly writes = new WriteQueue();

  protected override allowMissingFile(): boolean {
    return true;
  }

  protected async parseContent(content: string): Promise<void> {
    this.entries.clear();

    const lines = content.split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i]?.trim();
      if (!line) continue;

      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch (error) {
        throw this.lineError(i + 1, error instanceof Error ? error.message : String(error));
      }

      const parsed = parseOptionModifierRecord(raw);
      if (!parsed.ok) throw this.lineError(i + 1, parsed.error);

      const key = registryKey(parsed.value);
      const existing = this.entries.get(key);
      this.entries.set(key, existing ? mergeModifierRecords(existing, parsed.value) : parsed.value);
    }
  }

  async getModifier(brand: string, name: string, scope?: ModifierScope): Promise<OptionModifierRecord | null> {
    this.ensureConnected();
    const entry = pickModifier(this.entries.values(), brand, name, scope);
    return entry ? deepClone(entry) : null;
  }

  async upsertModifier(record: OptionModifierRecord): Promise<void> {
    this.ensureConnected();

    const parsed = parseOptionModifierRecord(record);
    if (!parsed.ok) {
      throw new CollaboratorError({
        code: 'VALIDATION_ERROR',
        message: parsed.error,
        collaborator: this.config.id,
      });
    }

    await this.writes.enqueue(this.config.filePath, async () => {
      const key = registryKey(parsed.value);
      const existing = this.entries.get(key);
      const next = existing ? mergeModifierRecords(existing, parsed.value) : deepClone(parsed.value);

      const entries = new Map(this.entries);
      entries.set(key, next);
      await this.persist(serialize(entries.values()));
      this.entries.set(key, next);
    });
  }

  list(): OptionModifierRecord[] {
    this.ensureConnected();
    return [...this.entries.values()].map((entry) => deepClone(entry));
  }

  private lineError(line: number, message: string): CollaboratorError {
    return new CollaboratorError({
      code: 'VALIDATION_ERROR',
      message: `${this.config.filePath}:${line}: ${message}`,
      collaborator: this.config.id,
      suggestion: 'Fix or remove the line; every line must be one JSON modifier record.',
      context: { line },
    });
  }
}

function serialize(entries: Iterable<OptionModifierRecord>): string {
  const lines: string[] = [];
  for (const entry of entries) {
    lines.push(JSON.stringify(entry));
  }
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

export function createNdjsonModifierRegistry(config: NdjsonModifierRegistryConfig): NdjsonModifierRegistry {
  return new NdjsonModifierRegistry(config);
}
