export { getEnv, parseEnv, resetEnvCache } from "./env";
export type { Env } from "./env";
export { envSchema } from "./schema";
