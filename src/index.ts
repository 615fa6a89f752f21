/**
 * Public entry point: template rendering, recipient uploads and the
 * validators and formatters they share.
 */

export * from "./lib/sanitise";
export * from "./lib/formatters";
export * from "./lib/columns";
export * from "./lib/field";
export * from "./lib/templates";
export * from "./lib/recipients";
export * from "./lib/limits";
export { serverEnv, resetEnvCache } from "./lib/env/server";
export type { ServerEnv } from "./lib/env/server";
