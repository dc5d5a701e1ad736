export { envSchema, parseEnv } from "./env.js";
