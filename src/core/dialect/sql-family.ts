import type { DatabaseFamily } from '../uri/database-uri.js';

/**
 * The handful of dialect rules the runtime needs: identifier quoting,
 * parameter placeholders and catalog queries.
 */
export interface SqlFamilyDialect {
  readonly family: DatabaseFamily;
  quoteIdentifier(id: string): string;
  /** 1-based placeholder for the n-th bound parameter. */
  placeholder(index: number): string;
  /** Lists user tables, one `name` column per row, ordered by name. */
  readonly listTablesSql: string;
}

const quoteWith = (quote: string) => (id: string): string =>
  `${quote}${id.split(quote).join(quote + quote)}${quote}`;

const DIALECTS: Record<DatabaseFamily, SqlFamilyDialect> = {
  sqlite: {
    family: 'sqlite',
    quoteIdentifier: quoteWith('"'),
    placeholder: () => '?',
    listTablesSql:
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
  },
  postgresql: {
    family: 'postgresql',
    quoteIdentifier: quoteWith('"'),
    placeholder: index => `$${index}`,
    listTablesSql:
      'SELECT table_name AS name FROM information_schema.tables ' +
      "WHERE table_schema = current_schema() AND table_type = 'BASE TABLE' ORDER BY table_name",
  },
  mysql: {
    family: 'mysql',
    quoteIdentifier: quoteWith('`'),
    placeholder: () => '?',
    listTablesSql:
      'SELECT table_name AS name FROM information_schema.tables ' +
      "WHERE table_schema = DATABASE() AND table_type = 'BASE TABLE' ORDER BY table_name",
  },
};

export const getSqlFamilyDialect = (family: DatabaseFamily): SqlFamilyDialect => DIALECTS[family];

/**
 * Builds a parameterized single-row INSERT.
 */
export function buildInsertSql(
  dialect: SqlFamilyDialect,
  table: string,
  row: Record<string, unknown>
): { sql: string; params: unknown[] } {
  const columns = Object.keys(row);
  if (columns.length === 0) {
    const tail = dialect.family === 'mysql' ? '() VALUES ()' : 'DEFAULT VALUES';
    return { sql: `INSERT INTO ${dialect.quoteIdentifier(table)} ${tail}`, params: [] };
  }
  const cols = columns.map(c => dialect.quoteIdentifier(c)).join(', ');
  const values = columns.map((_, i) => dialect.placeholder(i + 1)).join(', ');
  return {
    sql: `INSERT INTO ${dialect.quoteIdentifier(table)} (${cols}) VALUES (${values})`,
    params: columns.map(c => row[c]),
  };
}
