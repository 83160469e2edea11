import type { FastifyInstance } from "fastify";

let processHooksRegistered = false;

type HealthCheckedClient = { healthCheck: () => Promise<unknown> };

export interface ManagedClient {
  name: string;
  get: () => Promise<HealthCheckedClient>;
  shutdown: () => Promise<void>;
}

async function loadDefaultClients(): Promise<ManagedClient[]> {
  const [configModule, openaiModule, qdrantModule, postgresModule] = await Promise.all([
    import("../config/index.js"),
    import("./openai.js"),
    import("./qdrant.js"),
    import("./postgres.js")
  ]);

  const clients: ManagedClient[] = [
    { name: "openai", get: openaiModule.getOpenAIClient, shutdown: openaiModule.shutdownOpenAIClient },
    { name: "qdrant", get: qdrantModule.getQdrantClient, shutdown: qdrantModule.shutdownQdrantClient }
  ];
  if (configModule.config.ENABLE_ANALYSIS_AUDIT) {
    clients.push({
      name: "postgres",
      get: postgresModule.getPostgresClient,
      shutdown: postgresModule.shutdownPostgresClient
    });
  }
  return clients;
}

async function shutdownAllClients(logPrefix: string, loadClients: () => Promise<ManagedClient[]>): Promise<void> {
  const clients = await loadClients();
  console.info(`${logPrefix} shutting down infrastructure clients`);
  await Promise.allSettled(clients.map((client) => client.shutdown()));
}

export interface ClientLifecycleOptions {
  enableBootstrap?: boolean;
  loadClients?: () => Promise<ManagedClient[]>;
  registerProcessSignals?: boolean;
  exit?: (code: number) => void;
}

export function registerClientLifecycle(app: FastifyInstance, options?: ClientLifecycleOptions): void {
  const enableBootstrap = options?.enableBootstrap ?? process.env.ENABLE_INFRA_BOOTSTRAP === "true";
  if (!enableBootstrap) {
    app.log.info("Infrastructure bootstrap disabled (set ENABLE_INFRA_BOOTSTRAP=true to enable).");
    return;
  }
  const loadClients = options?.loadClients ?? loadDefaultClients;
  const shouldRegisterProcessSignals = options?.registerProcessSignals ?? true;
  const exit = options?.exit ?? ((code: number) => process.exit(code));

  app.addHook("onReady", async () => {
    const clients = await loadClients();
    await Promise.all(clients.map((client) => client.get().then((instance) => instance.healthCheck())));
    app.log.info({ clients: clients.map((client) => client.name) }, "Infrastructure singletons initialized");
  });

  app.addHook("onClose", async () => {
    await shutdownAllClients("[lifecycle/onClose]", loadClients);
  });

  if (shouldRegisterProcessSignals && !processHooksRegistered) {
    processHooksRegistered = true;
    const handleSignal = async (signal: NodeJS.Signals): Promise<void> => {
      console.info(`[lifecycle/process] received ${signal}`);
      await shutdownAllClients("[lifecycle/process]", loadClients);
      exit(0);
    };

    const onSignal = (signal: NodeJS.Signals): void => {
      handleSignal(signal).catch((error: unknown) => {
        console.error("[lifecycle/process] shutdown failed", error);
        exit(1);
      });
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  }
}

export function resetClientLifecycleStateForTests(): void {
  processHooksRegistered = false;
}
