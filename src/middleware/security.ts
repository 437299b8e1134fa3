import cors from "cors";
import helmet from "helmet";
import { getCorsAllowlist } from "../config/env";

/** CDN serving the Swagger UI and ReDoc bundles used by the viewer pages. */
export const DOCS_CDN_ORIGIN = "https://cdn.jsdelivr.net";

export const securityHeaders = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'self'"],
      scriptSrc: ["'self'"],
      styleSrc: ["'self'", "'unsafe-inline'"],
      imgSrc: ["'self'", "data:", "https:"],
      connectSrc: ["'self'"],
      objectSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
});

// Viewer pages load their bundle from the CDN and boot it with an inline script.
export const docsContentSecurityPolicy = helmet.contentSecurityPolicy({
  directives: {
    defaultSrc: ["'self'"],
    scriptSrc: ["'self'", "'unsafe-inline'", DOCS_CDN_ORIGIN],
    styleSrc: ["'self'", "'unsafe-inline'", DOCS_CDN_ORIGIN, "https://fonts.googleapis.com"],
    fontSrc: ["'self'", "https://fonts.gstatic.com"],
    imgSrc: ["'self'", "data:", "https:"],
    connectSrc: ["'self'"],
    workerSrc: ["'self'", "blob:"],
    objectSrc: ["'none'"],
    frameAncestors: ["'none'"],
  },
});

export function corsMiddleware() {
  const allowlist = getCorsAllowlist();
  return cors({
    origin: allowlist.includes("*") ? "*" : allowlist,
    methods: ["GET", "HEAD", "OPTIONS"],
    optionsSuccessStatus: 204,
  });
}
