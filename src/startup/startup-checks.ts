import { config } from "../config/index.js";
import { assertMigrationsCurrent } from "../migrations/run-migrations.js";

/** The audit table must be migrated before the service accepts analyses. */
export async function runStartupChecks(options: { auditEnabled?: boolean } = {}): Promise<void> {
  if (!(options.auditEnabled ?? config.ENABLE_ANALYSIS_AUDIT)) {
    return;
  }

  await assertMigrationsCurrent();
}
