/**
 * Custody Persistence
 *
 * Restores the registered stores from the snapshot store on startup and
 * writes a fresh snapshot after every change. Writes never overlap: changes
 * that arrive while a write is in flight are folded into the next one.
 */

import { createServiceLogger } from '../observability/logger';
import { snapshotWritesTotal } from '../observability/metrics';
import { SnapshotSource } from './keyValueStore';
import { CustodySnapshot, SnapshotStore } from './snapshotStore';

const log = createServiceLogger('persistence');

export class CustodyPersistence {
  private readonly sources = new Map<string, SnapshotSource>();
  private version = 0;
  private dirty = false;
  private writing: Promise<void> | null = null;
  private lastError: unknown = null;

  constructor(private readonly store: SnapshotStore) {}

  /**
   * Track a store. Must be called before `restore`.
   */
  register(source: SnapshotSource): void {
    if (this.sources.has(source.name)) {
      throw new Error(`Store "${source.name}" is already registered`);
    }
    this.sources.set(source.name, source);
    source.onChange(() => this.schedule());
  }

  /**
   * Load the last snapshot into the registered stores. Returns false when
   * there was nothing to restore.
   */
  async restore(): Promise<boolean> {
    const snapshot = await this.store.read();
    if (!snapshot) {
      log.info('No custody snapshot found, starting empty');
      return false;
    }

    for (const [name, source] of this.sources) {
      source.load(snapshot.stores[name] ?? []);
    }
    this.version = snapshot.version;

    log.info(
      { version: snapshot.version, takenAt: snapshot.takenAt, stores: [...this.sources.keys()] },
      'Custody snapshot restored'
    );
    return true;
  }

  /**
   * Capture the current content of every registered store
   */
  snapshot(): CustodySnapshot {
    const stores: CustodySnapshot['stores'] = {};
    for (const [name, source] of this.sources) {
      stores[name] = source.snapshot();
    }
    return {
      version: this.version,
      takenAt: new Date().toISOString(),
      stores,
    };
  }

  /**
   * Resolve once every change made so far has been written (or has failed
   * and been logged)
   */
  async flush(): Promise<void> {
    if (this.dirty && !this.writing) {
      this.startWriting();
    }
    while (this.writing) {
      await this.writing;
    }
  }

  getStatus(): { version: number; pending: boolean; lastError: string | null } {
    return {
      version: this.version,
      pending: this.dirty || this.writing !== null,
      lastError: this.lastError === null ? null : String(this.lastError),
    };
  }

  private schedule(): void {
    this.dirty = true;
    if (!this.writing) {
      this.startWriting();
    }
  }

  private startWriting(): void {
    // Deferred to a microtask so a synchronous multi-step mutation is
    // captured whole, never half-applied
    this.writing = Promise.resolve()
      .then(() => this.writeLoop())
      .finally(() => {
        this.writing = null;
      });
  }

  private async writeLoop(): Promise<void> {
    while (this.dirty) {
      this.dirty = false;
      this.version += 1;
      const snapshot = this.snapshot();

      try {
        await this.store.write(snapshot);
        this.lastError = null;
        snapshotWritesTotal.inc({ result: 'success' });
      } catch (error) {
        // State stays authoritative in memory; the next change retries with a full snapshot
        this.lastError = error;
        snapshotWritesTotal.inc({ result: 'failure' });
        log.error({ err: error, version: snapshot.version }, 'Failed to write custody snapshot');
      }
    }
  }
}
