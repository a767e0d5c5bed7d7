export { envSchema, parseEnv, DEFAULT_SYSTEM_PROMPT } from "./env.js";
