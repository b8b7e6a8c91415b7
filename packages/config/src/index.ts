export { envSchema, parseEnv } from "./env.js";
export { loadConfig } from "./load.js";
