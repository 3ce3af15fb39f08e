import { getEnv } from "./env";
import type { LogLevel } from "./logger/schema";

export interface AppConfig {
  server: {
    nodeEnv: "development" | "production" | "test";
  };
  logging: {
    level: LogLevel;
  };
}

export const loadConfig = (): AppConfig => {
  const env = getEnv();
  return {
    server: {
      nodeEnv: env.NODE_ENV,
    },
    logging: {
      level: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
    },
  };
};
