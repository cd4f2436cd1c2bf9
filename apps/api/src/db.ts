import pg from 'pg';

// pg is CJS; in ESM we import the default and destructure.
const { Pool } = pg;
export type PgPool = InstanceType<typeof Pool>;

export type SqlResult = {
  rows: unknown[];
  rowCount: number | null;
};

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
}

// Dev reloads can re-run this module; keep a single pool per URL.
const globalForPg = globalThis as unknown as {
  orderIntakePools?: Map<string, PgPool>;
};

function schemaFromUrl(connectionString: string): string | null {
  try {
    return new URL(connectionString).searchParams.get('schema');
  } catch {
    return null;
  }
}

export function getPool(connectionString: string): PgPool {
  const pools = (globalForPg.orderIntakePools ??= new Map<string, PgPool>());
  const existing = pools.get(connectionString);
  if (existing) return existing;

  // `?schema=` is not understood by pg itself; map it onto search_path.
  const schema = schemaFromUrl(connectionString);
  const pool = new Pool({
    connectionString,
    options: schema ? `-c search_path=${schema}` : undefined,
  });
  pools.set(connectionString, pool);
  return pool;
}

export function createSqlClient(pool: PgPool): SqlClient {
  return {
    async query(text, values) {
      const res = await pool.query(text, values);
      return { rows: res.rows, rowCount: res.rowCount };
    },
  };
}
