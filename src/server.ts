import { fileURLToPath } from "node:url";
import { config } from "./config/index.js";
import { buildApp } from "./app.js";
import { runStartupChecks } from "./startup/startup-checks.js";

export async function bootstrap(port: number = config.PORT): Promise<void> {
  await runStartupChecks();

  const app = await buildApp();
  await app.listen({ host: "0.0.0.0", port });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  bootstrap().catch((error: unknown) => {
    console.error("Startup failed", error);
    process.exitCode = 1;
  });
}
