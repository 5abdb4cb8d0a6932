/**
 * @weft/sys - System utilities shared by weft packages
 *
 * Provides config lookup (overrides, environment variables, YAML files),
 * environment detection, id helpers, console logging and the domain errors
 * the HTTP layer maps to status codes.
 *
 * @example
 * ```typescript
 * import { config, Environment } from '@weft/sys';
 *
 * const port = config('web.serverPort', 8080);
 * if (Environment.isNotProd) {
 *   // ...
 * }
 * ```
 */

export * from "./config.js";
export * from "./environment.js";
export * from "./ids.js";
export * from "./log.js";
export * from "./errors.js";
