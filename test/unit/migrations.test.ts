import { describe, expect, it, vi } from "vitest";
import type { PoolClient } from "pg";
import {
  assertMigrationsCurrent,
  listPendingMigrations,
  runMigrations,
  type MigrationDependencies
} from "../../src/migrations/run-migrations.js";

function createDependencies(options: { files: string[]; applied: string[]; sources?: Record<string, string> }) {
  const statements: Array<{ sql: string; params?: unknown[] }> = [];
  const client = {
    query: vi.fn(async (sql: string, params?: unknown[]) => {
      statements.push({ sql, params });
      if (sql.startsWith("SELECT filename")) {
        return { rows: options.applied.map((filename) => ({ filename })) };
      }
      return { rows: [] };
    })
  };

  const dependencies: MigrationDependencies = {
    migrationsDir: "/migrations",
    readdirFn: async () => options.files,
    readFileFn: async (filePath) => options.sources?.[filePath] ?? "",
    withTransactionFn: async (operation) => operation(client as unknown as PoolClient)
  };

  return { dependencies, statements };
}

describe("migrations", () => {
  it("lists sql files that are not in the ledger, sorted by name", async () => {
    const { dependencies } = createDependencies({
      files: ["002_b.sql", "README.md", "001_a.sql", "003_c.sql"],
      applied: ["001_a.sql"]
    });

    await expect(listPendingMigrations(dependencies)).resolves.toEqual(["002_b.sql", "003_c.sql"]);
  });

  it("skips the ledger when there are no migration files", async () => {
    const { dependencies, statements } = createDependencies({ files: [], applied: [] });

    await expect(listPendingMigrations(dependencies)).resolves.toEqual([]);
    expect(statements).toEqual([]);
  });

  it("applies pending files without a byte order mark and records them", async () => {
    const { dependencies, statements } = createDependencies({
      files: ["001_audit.sql"],
      applied: [],
      sources: { "/migrations/001_audit.sql": "\uFEFFCREATE TABLE demo (id INT);" }
    });

    await expect(runMigrations(dependencies)).resolves.toEqual(["001_audit.sql"]);

    const sqls = statements.map((statement) => statement.sql);
    expect(sqls).toContain("CREATE TABLE demo (id INT);");
    expect(statements.at(-1)).toEqual({
      sql: "INSERT INTO schema_migrations (filename) VALUES ($1)",
      params: ["001_audit.sql"]
    });
  });

  it("rejects startup while migrations are pending", async () => {
    const { dependencies } = createDependencies({ files: ["001_x.sql"], applied: [] });

    await expect(assertMigrationsCurrent(dependencies)).rejects.toThrow(
      "Pending migrations detected: 001_x.sql. Run npm run migrate."
    );
  });

  it("passes when every migration is applied", async () => {
    const { dependencies } = createDependencies({ files: ["001_x.sql"], applied: ["001_x.sql"] });

    await expect(assertMigrationsCurrent(dependencies)).resolves.toBeUndefined();
  });
});
