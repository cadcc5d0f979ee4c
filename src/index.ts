export * from "./lib/cashflowModel";
export * from "./lib/cashflowEngine";
export type { LogLevel, ServerEnv } from "./lib/env/server";
export { serverEnv } from "./lib/env/server";
