/**
 * @weft/http - Express server setup
 *
 * Wires the pieces every web service needs:
 * - Router discovery from the application's own modules
 * - CORS from `web.corsOrigins`
 * - JSON bodies, cookies and the session cookie
 * - Request tracing and error reporting through @weft/trace
 * - Mapping of domain errors to 400/403/404/500
 * - OpenAPI document and Swagger UI outside production
 *
 * @example
 * ```typescript
 * // routes/orders.ts
 * import { idPathParam, jsonOr404, type Router } from '@weft/http';
 *
 * export const ordersRoutes: Router = {
 *   route(router) {
 *     router.get('/orders/:id', async (req, res) => {
 *       jsonOr404(res, await orders.find(idPathParam(req)));
 *     });
 *   },
 * };
 *
 * // main.ts: discovers routes/orders.ts, never main.ts itself
 * import { createWebServer } from '@weft/http';
 *
 * export const server = createWebServer({ discover: import.meta.url });
 * await server.start();
 * ```
 */

export * from "./types.js";
export * from "./server.js";
export * from "./discovery.js";
export * from "./cors.js";
export * from "./session.js";
export * from "./tracing.js";
export * from "./errors.js";
export * from "./openapi.js";
export * from "./context.js";
export * from "./logging.js";
export * from "./health.js";
export * from "./testing.js";
