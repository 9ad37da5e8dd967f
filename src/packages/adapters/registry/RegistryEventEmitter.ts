/**
 * RegistryEventEmitter — Transactional event log for registry services.
 *
 * Wraps event insertion into the `registry_events` table. Services emit
 * from inside their active transaction: the event is inserted within the
 * same transaction as the primary write, and if the transaction rolls
 * back, the event is rolled back too.
 *
 * Usage:
 *   const emitter = new RegistryEventEmitter(db);
 *
 *   db.transaction(() => {
 *     // primary write...
 *     emitter.emit({ type: 'ResolverSet', source, payload: { ... } });
 *   })();
 *
 * @module adapters/registry/RegistryEventEmitter
 */

import type Database from 'better-sqlite3';
import type { Address } from 'viem';
import type {
  RegistryEvent,
  RegistryEventType,
  StoredRegistryEvent,
} from '../../core/protocol/registry-events.js';

interface EventRow {
  id: number;
  type: RegistryEventType;
  source: Address;
  payload: string;
  created_at: number;
}

export class RegistryEventEmitter {
  private db: Database.Database;
  private clock: () => number;

  constructor(db: Database.Database, clock: () => number = () => Math.floor(Date.now() / 1000)) {
    this.db = db;
    this.clock = clock;
  }

  /**
   * Emit an event within the caller's transaction context.
   * @returns the event id
   */
  emit(event: RegistryEvent): number {
    const result = this.db.prepare(
      `INSERT INTO registry_events (type, source, payload, created_at) VALUES (?, ?, ?, ?)`
    ).run(event.type, event.source, JSON.stringify(event.payload), this.clock());
    return Number(result.lastInsertRowid);
  }

  /**
   * Events for one registry or factory, oldest first.
   */
  getEventsForSource(
    source: Address,
    opts?: { types?: RegistryEventType[] },
  ): StoredRegistryEvent[] {
    let sql = `SELECT * FROM registry_events WHERE source = ?`;
    const params: unknown[] = [source];

    if (opts?.types && opts.types.length > 0) {
      sql += ` AND type IN (${opts.types.map(() => '?').join(', ')})`;
      params.push(...opts.types);
    }

    sql += ` ORDER BY id ASC`;

    const rows = this.db.prepare(sql).all(...params) as EventRow[];
    return rows.map(rowToEvent);
  }
}

function rowToEvent(row: EventRow): StoredRegistryEvent {
  return {
    id: row.id,
    type: row.type,
    source: row.source,
    payload: JSON.parse(row.payload) as Record<string, unknown>,
    createdAt: row.created_at,
  };
}
