/**
 * Model Registry
 *
 * Immutable name → backend lookup table, built once from configuration. Safe to
 * read from any number of in-flight requests since nothing mutates it after
 * construction.
 *
 * @packageDocumentation
 */

import { UnknownModel } from './errors.js';
import type { ModelEntry } from './types.js';

export class ModelRegistry {
  private readonly entries: ReadonlyMap<string, ModelEntry>;

  constructor(entries: Iterable<ModelEntry>) {
    const map = new Map<string, ModelEntry>();
    for (const entry of entries) {
      if (map.has(entry.name)) {
        throw new Error(`Duplicate model name: ${entry.name}`);
      }
      map.set(entry.name, Object.freeze({ ...entry }));
    }
    this.entries = map;
  }

  /**
   * Resolve a model name. Exact, case-sensitive match; no fallback model.
   *
   * @throws UnknownModel
   */
  resolve(modelName: string): ModelEntry {
    const entry = this.entries.get(modelName);
    if (!entry) throw new UnknownModel(modelName);
    return entry;
  }

  has(modelName: string): boolean {
    return this.entries.has(modelName);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  list(): ModelEntry[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }
}
