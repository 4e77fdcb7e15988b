import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { PoolExhaustedError, SessionClosedError } from '../../src/core/errors.js';
import type { QueryLogEntry } from '../../src/orm/query-logger.js';
import { DatabaseManager } from '../../src/orm/database-manager.js';
import { COUNT_ITEMS, CREATE_ITEMS, memoryConfig, spyLogger } from './db-helpers.js';

describe('DatabaseManager sync scopes', () => {
  let db: DatabaseManager;
  let logger: ReturnType<typeof spyLogger>;

  const countItems = () => db.withSyncSession(s => s.query(COUNT_ITEMS)[0].n);

  beforeEach(() => {
    logger = spyLogger();
    db = new DatabaseManager({ config: memoryConfig(), logger });
    db.withSyncSession(s => {
      s.execute(CREATE_ITEMS);
      s.commit();
    });
  });

  afterEach(async () => {
    await db.dispose();
  });

  it('commits a transaction scope that returns normally', () => {
    const result = db.withSyncTransaction(s => {
      s.add('items', { name: 'a' });
      s.add('items', { name: 'b' });
      return 'done';
    });

    expect(result).toBe('done');
    expect(countItems()).toBe(2);
  });

  it('rolls back and re-throws the original error', () => {
    const boom = new Error('boom');

    expect(() =>
      db.withSyncTransaction(s => {
        s.add('items', { name: 'a' });
        s.flush();
        throw boom;
      })
    ).toThrow(boom);

    expect(countItems()).toBe(0);
  });

  it('never commits a bare session scope', () => {
    db.withSyncSession(s => {
      s.execute('INSERT INTO items (name) VALUES (?)', ['a']);
    });

    expect(countItems()).toBe(0);
  });

  it('keeps what a bare scope commits explicitly', () => {
    db.withSyncSession(s => {
      s.add('items', { name: 'a' });
      s.commit();
    });

    expect(countItems()).toBe(1);
  });

  it('rejects a body that returns a promise and rolls its work back', () => {
    expect(() =>
      db.withSyncTransaction(s => {
        s.execute('INSERT INTO items (name) VALUES (?)', ['a']);
        return Promise.resolve(1);
      })
    ).toThrow(TypeError);

    expect(countItems()).toBe(0);
  });

  it('logs a failing rollback and still surfaces the body error', () => {
    const boom = new Error('boom');

    expect(() =>
      db.withSyncTransaction(s => {
        s.close();
        throw boom;
      })
    ).toThrow(boom);

    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error.mock.calls[0][1]).toBeInstanceOf(SessionClosedError);
  });

  it('closes the session on every exit path', () => {
    const engine = db.getEngine('sync');

    expect(() =>
      db.withSyncSession(() => {
        throw new Error('fail');
      })
    ).toThrow('fail');

    expect(engine.openSessions).toBe(0);
    expect(engine.stats().leased).toBe(0);
  });

  it('fails fast when every connection is leased', () => {
    const held = db.openSyncSession();
    try {
      expect(() => db.withSyncSession(() => undefined)).toThrow(PoolExhaustedError);
    } finally {
      held.close();
    }
  });

  it('refuses work on a closed session', () => {
    const session = db.openSyncSession();
    session.close();
    session.close();

    expect(() => session.execute('SELECT 1')).toThrow(SessionClosedError);
    expect(() => session.add('items', { name: 'a' })).toThrow('Cannot add: the session is closed');
  });

  it('discards pending rows on rollback', () => {
    db.withSyncSession(s => {
      s.add('items', { name: 'a' });
      expect(s.pendingCount).toBe(1);
      s.rollback();
      expect(s.pendingCount).toBe(0);
      s.commit();
    });

    expect(countItems()).toBe(0);
  });

  it('dispatches through scope()', () => {
    db.scope('sync', true, s => s.add('items', { name: 'a' }));
    db.scope('sync', false, s => s.add('items', { name: 'b' }));

    expect(countItems()).toBe(1);
  });

  it('reports statements but not transaction control to listeners', () => {
    const engine = db.getEngine('sync');
    const seen: QueryLogEntry[] = [];
    const off = engine.events.on(entry => seen.push(entry));

    db.withSyncTransaction(s => {
      s.add('items', { name: 'x' });
      s.query('SELECT name FROM items');
    });
    off();

    expect(seen).toEqual([
      { sql: 'SELECT name FROM items', params: [] },
      { sql: 'INSERT INTO "items" ("name") VALUES (?)', params: ['x'] },
    ]);
  });

  it('lists tables without reporting the catalog query', () => {
    const engine = db.getEngine('sync');
    const seen: QueryLogEntry[] = [];
    engine.events.on(entry => seen.push(entry));

    expect(engine.listTables()).toEqual(['items']);
    expect(seen).toEqual([]);
  });

  it('disposes the engine after a standalone transaction', () => {
    db.standaloneSyncTransaction(s => s.execute('SELECT 1'));

    expect(db.registry.state('sync')).toBe('uninitialized');
  });
});
