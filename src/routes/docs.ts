import { Router } from "express";
import type { OpenApiDoc } from "../contracts/openapi";
import { renderRedocPage, renderSwaggerUiPage } from "../docs/html";
import { docsContentSecurityPolicy } from "../middleware/security";
import { DOCS_PATH } from "../responses/payloads";

export const OPENAPI_URL = "/openapi.json";
export const REDOC_PATH = "/redoc";

/** Paths served by this router; they describe the API and are not part of it. */
export const DOCUMENTATION_PATHS: readonly string[] = [OPENAPI_URL, DOCS_PATH, REDOC_PATH];

export function createDocsRouter(doc: OpenApiDoc): Router {
  const router = Router();
  const pageOptions = { title: doc.info.title, openApiUrl: OPENAPI_URL };
  const swaggerPage = renderSwaggerUiPage(pageOptions);
  const redocPage = renderRedocPage(pageOptions);

  router.get(OPENAPI_URL, (_req, res) => {
    res.status(200).json(doc);
  });

  router.get(DOCS_PATH, docsContentSecurityPolicy, (_req, res) => {
    res.status(200).type("html").send(swaggerPage);
  });

  router.get(REDOC_PATH, docsContentSecurityPolicy, (_req, res) => {
    res.status(200).type("html").send(redocPage);
  });

  return router;
}
