/**
 * Snapshot Stores
 *
 * Durable home of the custody state. A snapshot is the full content of every
 * registered key-value store at one point in time.
 */

import { z } from 'zod';
import { CustodySnapshot as CustodySnapshotModel } from '../models/CustodySnapshot';
import { StoreEntry } from './keyValueStore';

export interface CustodySnapshot {
  version: number;
  takenAt: string;
  stores: Record<string, StoreEntry[]>;
}

export interface SnapshotStore {
  read(): Promise<CustodySnapshot | null>;
  write(snapshot: CustodySnapshot): Promise<void>;
}

const StoreEntrySchema = z.object({
  key: z.string(),
  value: z.record(z.union([z.string(), z.number(), z.null()])),
});

const CustodySnapshotSchema = z.object({
  version: z.number(),
  // Mongo hands back a Date, the JSON form a string; older documents lack it
  takenAt: z
    .union([z.date(), z.string()])
    .optional()
    .transform((value) =>
      value instanceof Date ? value.toISOString() : value ?? new Date(0).toISOString()
    ),
  stores: z.record(z.array(StoreEntrySchema)),
});

const describeIssue = (issue: z.ZodIssue): string => {
  const [root, storeName, entry] = issue.path;
  if (root !== 'stores' || storeName === undefined) {
    return 'Malformed snapshot';
  }
  return entry === undefined
    ? `Malformed snapshot: store "${storeName}" is not a list`
    : `Malformed snapshot: bad entry in store "${storeName}"`;
};

/**
 * Validate a snapshot read back from storage
 */
export const parseSnapshot = (raw: unknown): CustodySnapshot => {
  const parsed = CustodySnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new Error(issue ? describeIssue(issue) : 'Malformed snapshot');
  }
  return parsed.data;
};

/**
 * Process-local snapshot store for tests and PERSISTENCE=memory
 */
export class MemorySnapshotStore implements SnapshotStore {
  private serialized: string | null = null;
  writes = 0;

  constructor(initial?: CustodySnapshot) {
    if (initial) {
      this.serialized = JSON.stringify(initial);
    }
  }

  async read(): Promise<CustodySnapshot | null> {
    return this.serialized === null ? null : parseSnapshot(JSON.parse(this.serialized));
  }

  async write(snapshot: CustodySnapshot): Promise<void> {
    this.serialized = JSON.stringify(snapshot);
    this.writes += 1;
  }
}

/**
 * MongoDB-backed snapshot store: one document per snapshot key, replaced on
 * every write
 */
export class MongoSnapshotStore implements SnapshotStore {
  constructor(private readonly key: string) {}

  async read(): Promise<CustodySnapshot | null> {
    const doc = await CustodySnapshotModel.findOne({ key: this.key }).lean();
    return doc ? parseSnapshot(doc) : null;
  }

  async write(snapshot: CustodySnapshot): Promise<void> {
    await CustodySnapshotModel.findOneAndUpdate(
      { key: this.key },
      {
        $set: {
          version: snapshot.version,
          takenAt: new Date(snapshot.takenAt),
          stores: snapshot.stores,
        },
      },
      { upsert: true }
    );
  }
}
