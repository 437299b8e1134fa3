import express from "express";

import { getEnvConfig, isContractGuardEnabled, shouldPrintRoutes } from "./config/env";
import { loadOpenApi, openApiPathToExpress, type OpenApiDoc } from "./contracts/openapi";
import { listRoutes, normalizePath, printRoutes } from "./debug/printRoutes";
import { createContractGuard } from "./middleware/contractGuard";
import { errorHandler, methodNotAllowedHandler, notFoundHandler } from "./middleware/errors";
import { requestId } from "./middleware/requestId";
import { requestLogger } from "./middleware/requestLogger";
import { corsMiddleware, securityHeaders } from "./middleware/security";
import apiRoutes from "./routes/api";
import { createDocsRouter } from "./routes/docs";
import rootRoutes from "./routes/root";

export type BuildAppOptions = {
  openApi?: OpenApiDoc;
  contractGuard?: boolean;
};

function routeKey(method: string, path: string): string {
  return `${method.toUpperCase()} ${normalizePath(path)}`;
}

/** Throws when an operation in the contract has no mounted handler. */
export function assertContractRoutesMounted(app: express.Express, doc: OpenApiDoc): void {
  const mounted = new Set(listRoutes(app).map((route) => routeKey(route.method, route.path)));
  const missing: string[] = [];
  Object.entries(doc.paths).forEach(([path, operations]) => {
    Object.keys(operations).forEach((method) => {
      const key = routeKey(method, openApiPathToExpress(path));
      if (!mounted.has(key)) {
        missing.push(key);
      }
    });
  });
  if (missing.length > 0) {
    throw new Error(`Missing API routes: ${missing.join(", ")}`);
  }
}

export function buildApp(options: BuildAppOptions = {}): express.Express {
  const doc = options.openApi ?? loadOpenApi();
  const app = express();

  app.set("trust proxy", getEnvConfig().trustProxy);

  app.use(requestId);
  app.use(securityHeaders);
  app.use(corsMiddleware());
  app.use(requestLogger);
  app.use(
    createContractGuard(doc, {
      enabled: options.contractGuard ?? isContractGuardEnabled(),
    })
  );

  app.use(rootRoutes);
  app.use("/api", apiRoutes);
  app.use(createDocsRouter(doc));

  assertContractRoutesMounted(app, doc);

  return app;
}

/** Must run after every route is mounted. */
export function registerFallbackHandlers(app: express.Express): void {
  app.use(methodNotAllowedHandler(app));
  app.use(notFoundHandler);
  app.use(errorHandler);

  if (shouldPrintRoutes()) {
    printRoutes(app);
  }
}

export function createApp(options: BuildAppOptions = {}): express.Express {
  const app = buildApp(options);
  registerFallbackHandlers(app);
  return app;
}
