import { env } from "./env.js";

export type { Env } from "./env.js";
export { envSchema, parseEnv, registryLanguageSchema, routeSchema } from "./env.js";

export type Config = Readonly<typeof env>;
export const config: Config = Object.freeze({ ...env });
