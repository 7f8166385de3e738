import fs from "fs";
import path from "path";
import { type Queryable } from "./db";
import { logInfo } from "./observability/logger";

const defaultMigrationsDir = path.join(__dirname, "..", "migrations");

export type MigrationOptions = {
  migrationsDir?: string;
  /** pg-mem has no `if not exists` on indexes. */
  pgMem?: boolean;
};

function listMigrationFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    return [];
  }
  return fs
    .readdirSync(dir)
    .filter((file) => file.endsWith(".sql"))
    .sort();
}

export function splitSql(sql: string): string[] {
  return sql
    .replace(/--.*$/gm, "")
    .split(";")
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
}

function normalizeStatementForPgMem(statement: string): string {
  return statement.replace(/create index if not exists/gi, "create index");
}

async function ensureMigrationsTable(db: Queryable): Promise<void> {
  await db.query(
    `create table if not exists schema_migrations (
      id text primary key,
      applied_at timestamptz not null
    )`
  );
}

async function fetchAppliedMigrations(db: Queryable): Promise<Set<string>> {
  const res = await db.query<{ id: string }>("select id from schema_migrations");
  return new Set(res.rows.map((row) => row.id));
}

export async function runMigrations(db: Queryable, options: MigrationOptions = {}): Promise<string[]> {
  const dir = options.migrationsDir ?? defaultMigrationsDir;
  await ensureMigrationsTable(db);
  const applied = await fetchAppliedMigrations(db);
  const newlyApplied: string[] = [];

  for (const file of listMigrationFiles(dir)) {
    if (applied.has(file)) {
      continue;
    }
    const rawSql = fs.readFileSync(path.join(dir, file), "utf8");
    for (const statement of splitSql(rawSql)) {
      await db.query(options.pgMem ? normalizeStatementForPgMem(statement) : statement);
    }
    await db.query("insert into schema_migrations (id, applied_at) values ($1, $2)", [
      file,
      new Date().toISOString(),
    ]);
    newlyApplied.push(file);
    logInfo("migration_applied", { migration: file });
  }

  return newlyApplied;
}
