import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { PoolClient } from "pg";
import { shutdownPostgresClient, withTransaction } from "../clients/postgres.js";

const currentFilePath = fileURLToPath(import.meta.url);
export const defaultMigrationsDir = path.resolve(path.dirname(currentFilePath), "../../migrations");

const CREATE_LEDGER_SQL = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    filename TEXT PRIMARY KEY,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
`;

export interface MigrationDependencies {
  migrationsDir?: string;
  readdirFn?: (directory: string) => Promise<string[]>;
  readFileFn?: (filePath: string, encoding: "utf8") => Promise<string>;
  withTransactionFn?: <T>(operation: (client: PoolClient) => Promise<T>) => Promise<T>;
}

const resolve = (dependencies: MigrationDependencies) => ({
  migrationsDir: dependencies.migrationsDir ?? defaultMigrationsDir,
  readdirFn: dependencies.readdirFn ?? ((directory: string) => readdir(directory)),
  readFileFn: dependencies.readFileFn ?? ((filePath: string, encoding: "utf8") => readFile(filePath, encoding)),
  withTransactionFn: dependencies.withTransactionFn ?? withTransaction
});

const listMigrationFiles = async (resolved: ReturnType<typeof resolve>): Promise<string[]> =>
  (await resolved.readdirFn(resolved.migrationsDir)).filter((name) => name.endsWith(".sql")).sort();

export async function listPendingMigrations(dependencies: MigrationDependencies = {}): Promise<string[]> {
  const resolved = resolve(dependencies);
  const files = await listMigrationFiles(resolved);
  if (files.length === 0) {
    return [];
  }

  const applied = await resolved.withTransactionFn(async (client) => {
    await client.query(CREATE_LEDGER_SQL);
    const result = await client.query<{ filename: string }>("SELECT filename FROM schema_migrations");
    return new Set(result.rows.map((row) => row.filename));
  });

  return files.filter((file) => !applied.has(file));
}

/** Applies pending `.sql` files in name order, each in its own transaction. */
export async function runMigrations(dependencies: MigrationDependencies = {}): Promise<string[]> {
  const resolved = resolve(dependencies);
  const pending = await listPendingMigrations(dependencies);
  const applied: string[] = [];

  for (const filename of pending) {
    const source = await resolved.readFileFn(path.join(resolved.migrationsDir, filename), "utf8");
    const migrationSql = source.replace(/^\uFEFF/, "");

    await resolved.withTransactionFn(async (client) => {
      await client.query(migrationSql);
      await client.query("INSERT INTO schema_migrations (filename) VALUES ($1)", [filename]);
    });

    applied.push(filename);
  }

  return applied;
}

export async function assertMigrationsCurrent(dependencies: MigrationDependencies = {}): Promise<void> {
  const pending = await listPendingMigrations(dependencies);
  if (pending.length > 0) {
    throw new Error(`Pending migrations detected: ${pending.join(", ")}. Run npm run migrate.`);
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  runMigrations()
    .then((applied) => {
      console.log(applied.length === 0 ? "No pending migrations." : `Applied migrations: ${applied.join(", ")}`);
    })
    .catch((error: unknown) => {
      console.error("Migration failed", error);
      process.exitCode = 1;
    })
    .finally(() =>
      shutdownPostgresClient().catch((error: unknown) => {
        console.error("Postgres shutdown failed", error);
      })
    );
}
