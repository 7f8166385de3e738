import { Pool, type PoolClient } from "pg";
import { getDatabaseUrl } from "./config";
import { errorMessage, logError } from "./observability/logger";

export type Queryable = Pick<PoolClient, "query">;

export function createPool(connectionString = getDatabaseUrl()): Pool {
  const pool = new Pool({ connectionString });
  pool.on("error", (err) => {
    logError("db_pool_error", { error: errorMessage(err) });
  });
  return pool;
}

export async function checkDb(db: Queryable): Promise<void> {
  await db.query("select 1 as ok");
}
