import type { Pool } from 'pg';
import { COLLECTIONS, type CollectionName } from '../config/search/constants';
import { UnknownCollectionError } from '../errors';
import type { RawRecord } from '../types';

export interface ContentRepository {
  fetchAll(collection: CollectionName): Promise<RawRecord[]>;
  countAll(collection: CollectionName): Promise<number>;
  ping(): Promise<void>;
}

const KNOWN_COLLECTIONS = new Set<string>(Object.values(COLLECTIONS));

function assertCollection(collection: string): void {
  // Table names cannot be bound as parameters.
  if (!KNOWN_COLLECTIONS.has(collection)) {
    throw new UnknownCollectionError(collection);
  }
}

export class PgContentRepository implements ContentRepository {
  constructor(private readonly pool: Pool) {}

  async fetchAll(collection: CollectionName): Promise<RawRecord[]> {
    assertCollection(collection);
    const { rows } = await this.pool.query<RawRecord>(`SELECT * FROM ${collection} ORDER BY id;`);
    return rows;
  }

  async countAll(collection: CollectionName): Promise<number> {
    assertCollection(collection);
    const { rows } = await this.pool.query<{ count: string }>(`SELECT count(*) AS count FROM ${collection};`);
    return Number(rows[0]?.count ?? 0);
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }
}

/** Repository over fixed in-process rows; used by tests and local tooling. */
export class InMemoryContentRepository implements ContentRepository {
  private readonly data: Map<CollectionName, RawRecord[]>;

  constructor(seed: Partial<Record<CollectionName, RawRecord[]>> = {}) {
    this.data = new Map();
    for (const name of Object.values(COLLECTIONS)) {
      this.data.set(name, seed[name] ?? []);
    }
  }

  async fetchAll(collection: CollectionName): Promise<RawRecord[]> {
    assertCollection(collection);
    return (this.data.get(collection) ?? []).map((row) => ({ ...row }));
  }

  async countAll(collection: CollectionName): Promise<number> {
    assertCollection(collection);
    return this.data.get(collection)?.length ?? 0;
  }

  async ping(): Promise<void> {
    return;
  }
}
