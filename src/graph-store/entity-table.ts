import { GraphError } from '../common/errors/graph-error';
import { EntityMeta } from './types/graph.types';

/**
 * Id-keyed rows of one entity kind plus the set of rows changed since the last
 * `takeDelta()`. Reads hand out deep copies; `peek*` returns the stored rows
 * and is reserved for code inside the graph-store package.
 */
export class EntityTable<T extends EntityMeta> {
  private readonly rows = new Map<number, T>();
  private readonly dirty = new Set<number>();
  private readonly removed = new Set<number>();
  private maxId = 0;

  constructor(
    private readonly entity: string,
    seed: readonly T[] = [],
  ) {
    for (const row of seed) {
      if (this.rows.has(row.id)) {
        throw new GraphError(
          'Conflict',
          `Duplicate ${this.entity} id ${row.id} in stored graph`,
        );
      }
      this.rows.set(row.id, structuredClone(row));
      this.maxId = Math.max(this.maxId, row.id);
    }
  }

  get size(): number {
    return this.rows.size;
  }

  has(id: number): boolean {
    return this.rows.has(id);
  }

  get(id: number): T | undefined {
    const row = this.rows.get(id);
    return row ? structuredClone(row) : undefined;
  }

  peek(id: number): Readonly<T> | undefined {
    return this.rows.get(id);
  }

  require(id: number): Readonly<T> {
    const row = this.rows.get(id);
    if (!row) throw GraphError.notFound(this.entity, id);
    return row;
  }

  peekAll(): Readonly<T>[] {
    return Array.from(this.rows.values()).sort((a, b) => a.id - b.id);
  }

  values(): T[] {
    return this.peekAll().map((row) => structuredClone(row));
  }

  allocateId(requested?: number): number {
    if (requested === undefined) return this.maxId + 1;
    if (!Number.isInteger(requested) || requested <= 0) {
      throw new GraphError(
        'ValidationFailed',
        `${this.entity} id must be a positive integer`,
      );
    }
    if (this.rows.has(requested)) {
      throw new GraphError(
        'Conflict',
        `${this.entity} ${requested} already exists`,
      );
    }
    return requested;
  }

  put(row: T): T {
    const stored = structuredClone(row);
    this.rows.set(stored.id, stored);
    this.maxId = Math.max(this.maxId, stored.id);
    this.dirty.add(stored.id);
    this.removed.delete(stored.id);
    return structuredClone(stored);
  }

  delete(id: number): T {
    const row = this.rows.get(id);
    if (!row) throw GraphError.notFound(this.entity, id);
    this.rows.delete(id);
    this.dirty.delete(id);
    this.removed.add(id);
    return structuredClone(row);
  }

  takeDelta(): { upserted: T[]; deletedIds: number[] } {
    const upserted = Array.from(this.dirty)
      .sort((a, b) => a - b)
      .map((id) => this.rows.get(id))
      .filter((row): row is T => row !== undefined)
      .map((row) => structuredClone(row));
    const deletedIds = Array.from(this.removed).sort((a, b) => a - b);
    this.dirty.clear();
    this.removed.clear();
    return { upserted, deletedIds };
  }

  /**
   * Marks the rows of an unwritten delta as changed again. The next
   * `takeDelta()` reports each row as it is now, so later edits win.
   */
  restoreDelta(delta: { upserted: readonly T[]; deletedIds: readonly number[] }): void {
    for (const row of delta.upserted) {
      if (this.rows.has(row.id)) this.dirty.add(row.id);
    }
    for (const id of delta.deletedIds) {
      if (!this.rows.has(id)) this.removed.add(id);
    }
  }
}

export function assertVersion(
  entity: string,
  current: Readonly<EntityMeta>,
  expected: number | undefined,
): void {
  if (expected !== undefined && expected !== current.version) {
    throw new GraphError(
      'StaleState',
      `${entity} ${current.id} is at version ${current.version}, change was based on ${expected}`,
    );
  }
}
