// tests/execution/better-sqlite-executor.test.ts
import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createBetterSqliteExecutor } from '../../src/core/execution/executors/better-sqlite-executor.js';

describe('createBetterSqliteExecutor', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
    db.exec('CREATE TABLE items (id INTEGER PRIMARY KEY, name TEXT)');
  });

  afterEach(() => {
    db.close();
  });

  it('returns rowsAffected for writes and rows for reads', () => {
    const executor = createBetterSqliteExecutor(db);

    const insert = executor.executeSql('INSERT INTO items (name) VALUES (?), (?)', ['a', 'b']);
    expect(insert).toEqual({ columns: [], values: [], rowsAffected: 2 });

    const select = executor.executeSql('SELECT id, name FROM items WHERE id > ? ORDER BY id', [0]);
    expect(select.columns).toEqual(['id', 'name']);
    expect(select.values).toEqual([
      [1, 'a'],
      [2, 'b'],
    ]);
  });

  it('rolls back work done inside a transaction', () => {
    const executor = createBetterSqliteExecutor(db);

    executor.beginTransaction();
    executor.executeSql('INSERT INTO items (name) VALUES (?)', ['gone']);
    executor.rollbackTransaction();

    expect(executor.executeSql('SELECT COUNT(*) AS n FROM items').values).toEqual([[0]]);
  });
});
