import type { Express } from "express";
import swaggerUi from "swagger-ui-express";
import { Application, Environment } from "@weft/sys";
import type { OpenApiPathItem, Router } from "./types.js";

export const OPENAPI_PATH = "/openapi";
export const SWAGGER_UI_PATH = "/webjars/swagger-ui";

export interface OpenApiDocument {
  openapi: string;
  info: { title: string; version: string };
  components: {
    securitySchemes: Record<string, { type: string; scheme: string; bearerFormat?: string }>;
  };
  security: Array<Record<string, string[]>>;
  paths: Record<string, OpenApiPathItem>;
}

/**
 * OpenAPI is served outside production, or in production when explicitly allowed
 */
export function isOpenApiEnabled(useOpenApi: boolean, allowOpenApiInProd: boolean): boolean {
  return useOpenApi && (allowOpenApiInProd || Environment.isNotProd);
}

/**
 * Build the document from the path items routers declare
 */
export function buildOpenApiDocument(routers: Router[]): OpenApiDocument {
  const paths: Record<string, OpenApiPathItem> = {};
  for (const router of routers) {
    for (const [path, item] of Object.entries(router.openApi ?? {})) {
      paths[path] = { ...paths[path], ...item };
    }
  }

  return {
    openapi: "3.0.3",
    info: {
      title: Application.name,
      version: Environment.version,
    },
    components: {
      securitySchemes: {
        BearerAuth: { type: "http", scheme: "bearer" },
      },
    },
    security: [{ BearerAuth: [] }],
    paths,
  };
}

/**
 * Serve the document at /openapi and Swagger UI at /webjars/swagger-ui/.
 * The root path redirects to the UI.
 */
export function registerOpenApi(app: Express, document: () => OpenApiDocument): void {
  app.get(OPENAPI_PATH, (_req, res) => {
    res.json(document());
  });

  app.use(
    SWAGGER_UI_PATH,
    swaggerUi.serve,
    swaggerUi.setup(undefined, {
      customSiteTitle: Application.name,
      swaggerOptions: { url: OPENAPI_PATH },
    })
  );

  app.get("/", (_req, res) => {
    res.redirect(302, `${SWAGGER_UI_PATH}/`);
  });
}
