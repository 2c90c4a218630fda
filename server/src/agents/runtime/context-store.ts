/**
 * Shared Context Store: versioned key/value working set for one session.
 *
 * Keys are session-global or scoped to one example. Every write is checked
 * against the key's declared owners; a commit either applies all of its writes
 * or none of them.
 */

import type { ContextEntry, ContextKey, ContextSnapshot } from './agent-protocol.js';
import { OwnershipViolation } from './errors.js';

export interface ContextWrite {
  key: ContextKey;
  value: unknown;
  /** Example id for example-scoped keys */
  exampleId?: string | null;
}

/** Read-only surface handed to the Router and Revision Cycle Manager */
export interface ContextReader {
  readonly version: number;
  get(key: ContextKey, exampleId?: string | null): unknown;
  entry(key: ContextKey, exampleId?: string | null): Readonly<ContextEntry> | undefined;
  has(key: ContextKey, exampleId?: string | null): boolean;
  /** Every scoped entry for `key`, keyed by example id, in write order */
  scopedEntries(key: ContextKey): Array<[exampleId: string, entry: Readonly<ContextEntry>]>;
}

export type OwnerLookup = (key: ContextKey) => readonly string[];

const SCOPE_SEPARATOR = '#';

export function storageKey(key: ContextKey, exampleId?: string | null): string {
  return exampleId ? `${key}${SCOPE_SEPARATOR}${exampleId}` : key;
}

export class SharedContextStore implements ContextReader {
  private entries = new Map<string, ContextEntry>();
  private currentVersion = 0;

  constructor(private readonly ownersOf: OwnerLookup) {}

  get version(): number {
    return this.currentVersion;
  }

  get(key: ContextKey, exampleId?: string | null): unknown {
    return this.entries.get(storageKey(key, exampleId))?.value;
  }

  entry(key: ContextKey, exampleId?: string | null): Readonly<ContextEntry> | undefined {
    return this.entries.get(storageKey(key, exampleId));
  }

  has(key: ContextKey, exampleId?: string | null): boolean {
    return this.entries.has(storageKey(key, exampleId));
  }

  scopedEntries(key: ContextKey): Array<[string, Readonly<ContextEntry>]> {
    const prefix = `${key}${SCOPE_SEPARATOR}`;
    const found: Array<[string, ContextEntry]> = [];
    for (const [stored, entry] of this.entries) {
      if (stored.startsWith(prefix)) found.push([stored.slice(prefix.length), entry]);
    }
    return found;
  }

  /** Single write; same ownership rules as commit(). */
  put(writer: string, key: ContextKey, value: unknown, exampleId?: string | null): number {
    return this.commit(writer, [{ key, value, exampleId }]);
  }

  /**
   * Apply a batch of writes as one version. Ownership of every write is checked
   * before any is applied, so an OwnershipViolation leaves the store unchanged.
   */
  commit(writer: string, writes: readonly ContextWrite[]): number {
    for (const write of writes) {
      const owners = this.ownersOf(write.key);
      if (!owners.includes(writer)) {
        throw new OwnershipViolation(writer, write.key, owners);
      }
    }
    if (writes.length === 0) return this.currentVersion;

    this.currentVersion += 1;
    for (const write of writes) {
      this.entries.set(storageKey(write.key, write.exampleId), {
        value: structuredClone(write.value),
        version: this.currentVersion,
        writer,
      });
    }
    return this.currentVersion;
  }

  snapshot(): ContextSnapshot {
    const entries: Record<string, Readonly<ContextEntry>> = {};
    for (const [stored, entry] of this.entries) {
      entries[stored] = Object.freeze({ ...entry, value: deepFreeze(structuredClone(entry.value)) });
    }
    return Object.freeze({
      version: this.currentVersion,
      taken_at: new Date().toISOString(),
      entries: Object.freeze(entries),
    });
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}
