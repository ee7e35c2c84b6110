import * as v from "valibot";

import { type Env, envSchema } from "./schema";

/** Validates an environment map; throws `ValiError` on the first invalid variable set. */
export const parseEnv = (source: NodeJS.ProcessEnv = process.env): Env => v.parse(envSchema, source);

const loadEnv = (): Env => {
  try {
    return parseEnv();
  } catch (error) {
    if (v.isValiError(error)) {
      console.error("Environment variable validation failed:");
      for (const issue of error.issues) {
        console.error(`  - ${issue.path?.map((item) => String(item.key)).join(".")}: ${issue.message}`);
      }
      process.exit(1);
    }
    throw error;
  }
};

// Lazy initialization to allow tests to set process.env before parsing
let cachedEnv: Env | undefined;

export const getEnv = (): Env => {
  if (!cachedEnv) {
    cachedEnv = loadEnv();
  }
  return cachedEnv;
};

const isEnvKey = (key: string | symbol, env: Env): key is keyof Env =>
  typeof key === "string" && key in env;

export const env: Env = new Proxy({} as Env, {
  get(_target, prop) {
    const current = getEnv();
    if (isEnvKey(prop, current)) {
      return current[prop];
    }
    return undefined;
  },
});

export type { Env } from "./schema";
