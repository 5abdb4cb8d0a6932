import express, { type Express } from "express";
import cookieParser from "cookie-parser";
import { createServer, type Server } from "http";
import type { Socket } from "net";
import { Environment, config, configObject, configOrNull, log, logError } from "@weft/sys";
import { Trace } from "@weft/trace";
import type { Router, WebServerOptions } from "./types.js";
import { createCorsMiddleware, parseCorsOrigins } from "./cors.js";
import { discoverRouters } from "./discovery.js";
import { createErrorHandler } from "./errors.js";
import { HEALTH_PATH, registerHealth } from "./health.js";
import { createLoggingMiddleware } from "./logging.js";
import { buildOpenApiDocument, isOpenApiEnabled, registerOpenApi } from "./openapi.js";
import { createTestClient, type TestCase } from "./testing.js";
import {
  EmptyWebTraceExtraBuilder,
  bindTraceContext,
  createTraceMiddleware,
  isWebTraceExtraBuilder,
} from "./tracing.js";

// Extend http.IncomingMessage to support rawBody
declare module "http" {
  interface IncomingMessage {
    rawBody: unknown;
  }
}

export const DEFAULT_SERVER_PORT = 8080;

export interface WebServer {
  /**
   * The configured Express app, built on first call
   */
  app(): Promise<Express>;

  /**
   * Listen on `web.serverPort` until stop() or SIGINT/SIGTERM
   */
  start(): Promise<void>;

  /**
   * Shutdown the server gracefully with connection draining
   */
  stop(): Promise<void>;

  /**
   * Run a test case against a fresh app listening on an ephemeral local port
   */
  test<T>(testCase: TestCase<T>): Promise<T>;

  isReady(): boolean;

  /**
   * Port the started server is bound to, or null when not listening
   */
  port(): number | null;
}

function listen(server: Server, port: number, host: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen({ port, host }, () => {
      server.off("error", reject);
      resolve();
    });
  });
}

function boundPort(server: Server): number | null {
  const address = server.address();
  return address !== null && typeof address === "object" ? address.port : null;
}

/**
 * Create an Express server with CORS, JSON bodies, session cookies,
 * request tracing, error mapping and optional OpenAPI exposure.
 *
 * @example
 * ```typescript
 * export const server = createWebServer({ discover: import.meta.url });
 * await server.start();
 * ```
 */
export function createWebServer(options: WebServerOptions = {}): WebServer {
  const {
    setup,
    routers: explicitRouters = [],
    discover,
    telemetry,
    enableLogging = true,
    middleware = [],
    health = true,
  } = options;

  const useOpenApi = config("web.openApi", true);
  const allowOpenApiInProd = config("web.allowOpenApiInProd", false);
  const traceExtraBuilder = configObject("web.traceExtraBuilder", isWebTraceExtraBuilder, EmptyWebTraceExtraBuilder);
  const corsSetting = configOrNull("web.corsOrigins");
  const corsOrigins = corsSetting === null ? null : parseCorsOrigins(String(corsSetting));
  const port = config("web.serverPort", DEFAULT_SERVER_PORT);
  const host = config("web.host", "0.0.0.0");
  const verbose = config("web.logVerbose", false);

  const shutdownConfig = {
    gracePeriodMs: options.shutdown?.gracePeriodMs ?? 30000,
    hooks: options.shutdown?.hooks ?? [],
  };

  if (telemetry) {
    Trace.useClient(telemetry);
  }

  let serverReady = false;
  let isShuttingDown = false;
  let appPromise: Promise<Express> | null = null;
  let httpServer: Server | null = null;
  const activeConnections = new Set<Socket>();
  const signalHandlers = new Map<NodeJS.Signals, () => void>();

  async function collectRouters(): Promise<Router[]> {
    const routers = [...explicitRouters];
    if (discover) {
      for (const router of await discoverRouters(discover)) {
        if (!routers.includes(router)) routers.push(router);
      }
    }
    return routers;
  }

  async function buildApp(isReady: () => boolean): Promise<Express> {
    const app = express();
    app.set("trust proxy", 1);

    if (corsOrigins) {
      app.use(createCorsMiddleware(corsOrigins));
    }

    app.use(cookieParser());
    app.use(createTraceMiddleware({ extraBuilder: traceExtraBuilder, telemetry }));

    // Body parsing with raw body support
    app.use(
      bindTraceContext(
        express.json({
          verify: (req, _res, buf) => {
            req.rawBody = buf;
          },
        })
      )
    );
    app.use(bindTraceContext(express.urlencoded({ extended: false })));

    if (enableLogging) {
      app.use(createLoggingMiddleware({ verbose, telemetry, excludePaths: [HEALTH_PATH] }));
    }

    if (health) {
      registerHealth(app, isReady);
    }

    const routers = await collectRouters();

    if (isOpenApiEnabled(useOpenApi, allowOpenApiInProd)) {
      registerOpenApi(app, () => buildOpenApiDocument(routers));
    }

    for (const mw of middleware) {
      app.use(mw);
    }

    if (setup) {
      await setup(app);
    }

    for (const router of routers) {
      await router.route(app);
    }

    app.use(createErrorHandler());
    return app;
  }

  function app(): Promise<Express> {
    if (!appPromise) {
      appPromise = buildApp(() => serverReady).catch((err: unknown) => {
        appPromise = null;
        throw err;
      });
    }
    return appPromise;
  }

  async function start(): Promise<void> {
    if (httpServer) {
      log("Server already started");
      return;
    }
    log(`Starting server in ${Environment.name} mode`);

    const server = createServer(await app());
    server.timeout = 120000;
    server.keepAliveTimeout = 65000;
    server.headersTimeout = 66000;

    server.on("connection", (socket: Socket) => {
      activeConnections.add(socket);
      socket.on("close", () => {
        activeConnections.delete(socket);
      });
    });

    await listen(server, port, host);
    httpServer = server;
    isShuttingDown = false;
    serverReady = true;
    log(`Server listening on http://${host}:${boundPort(server) ?? port}`);

    telemetry?.event("service.started", "web server started", {
      env: Environment.name,
      port: boundPort(server),
    });

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      const handler = () => {
        stop()
          .catch((err: unknown) => logError("Shutdown failed", err))
          .finally(() => process.exit(0));
      };
      signalHandlers.set(signal, handler);
      process.on(signal, handler);
    }
  }

  async function stop(): Promise<void> {
    if (isShuttingDown) {
      log("Shutdown already in progress");
      return;
    }
    isShuttingDown = true;
    serverReady = false;
    log("Starting graceful shutdown...");

    for (const [signal, handler] of signalHandlers) {
      process.off(signal, handler);
    }
    signalHandlers.clear();

    if (shutdownConfig.hooks.length > 0) {
      log(`Running ${shutdownConfig.hooks.length} shutdown hook(s)...`);
      for (const hook of shutdownConfig.hooks) {
        try {
          await hook();
        } catch (err) {
          logError("Shutdown hook failed", err);
        }
      }
    }

    const server = httpServer;
    if (server) {
      log(`Closing server (${activeConnections.size} active connections)...`);

      await new Promise<void>((resolve) => {
        const forceCloseTimeout = setTimeout(() => {
          log(`Grace period expired, forcefully closing ${activeConnections.size} connections`);
          for (const socket of activeConnections) {
            socket.destroy();
          }
          activeConnections.clear();
        }, shutdownConfig.gracePeriodMs);
        forceCloseTimeout.unref();

        server.close(() => {
          clearTimeout(forceCloseTimeout);
          log("Server shut down successfully");
          resolve();
        });

        // End idle keep-alive connections
        server.closeIdleConnections();
      });
      httpServer = null;
    }

    if (telemetry) {
      await telemetry.shutdown();
    }
  }

  async function test<T>(testCase: TestCase<T>): Promise<T> {
    const testApp = await buildApp(() => true);
    const server = createServer(testApp);
    await listen(server, 0, "127.0.0.1");

    try {
      return await testCase(testApp, createTestClient(`http://127.0.0.1:${boundPort(server) ?? 0}`));
    } finally {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      });
    }
  }

  return {
    app,
    start,
    stop,
    test,
    isReady: () => serverReady,
    port: () => (httpServer ? boundPort(httpServer) : null),
  };
}
