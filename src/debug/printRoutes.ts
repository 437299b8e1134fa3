import type { Application, Express } from "express";
import { logInfo } from "../observability/logger";

export type RouteEntry = { method: string; path: string };

type Layer = {
  route?: {
    path: string | string[];
    methods: Record<string, boolean>;
  };
  name?: string;
  handle?: { stack?: Layer[] };
  regexp?: RegExp & { fast_slash?: boolean };
};

// Derived from the mount regexp only: Express rewrites `layer.path` on every match.
function getLayerPath(layer: Layer): string {
  if (layer.regexp?.fast_slash) {
    return "";
  }

  const source = layer.regexp?.source;
  if (!source || source === "^\\/?$") {
    return "";
  }

  let path = source
    .replace("^\\/", "/")
    .replace("\\/?(?=\\/|$)", "")
    .replace("(?=\\/|$)", "")
    .replace(/\\\//g, "/")
    .replace(/\$$/, "")
    .replace(/^\^/, "")
    .replace(/\?$/, "");

  if (!path.startsWith("/")) {
    path = `/${path}`;
  }

  return path === "/" ? "" : path;
}

function joinPaths(prefix: string, suffix: string): string {
  const base = prefix === "/" ? "" : prefix;
  const tail = suffix === "/" ? "" : suffix;
  const combined = `${base}${tail}`;
  if (!combined) {
    return "/";
  }
  return combined.startsWith("/") ? combined : `/${combined}`;
}

function walkStack(stack: Layer[], prefix: string, routes: RouteEntry[]): void {
  stack.forEach((layer) => {
    if (layer.route) {
      const paths = Array.isArray(layer.route.path) ? layer.route.path : [layer.route.path];
      const methods = Object.entries(layer.route.methods)
        .filter(([method, enabled]) => enabled && method !== "_all")
        .map(([method]) => method.toUpperCase());
      methods.forEach((method) => {
        paths.forEach((routePath) => routes.push({ method, path: joinPaths(prefix, routePath) }));
      });
      return;
    }

    if (layer.name === "router" && layer.handle?.stack) {
      walkStack(layer.handle.stack, joinPaths(prefix, getLayerPath(layer)), routes);
    }
  });
}

function getRouterStack(app: Express | Application): Layer[] {
  const router: unknown = Reflect.get(app, "_router");
  // Express 4 routers are callable, so `_router` is a function.
  if ((typeof router !== "object" && typeof router !== "function") || router === null) {
    return [];
  }
  const stack: unknown = Reflect.get(router, "stack");
  return Array.isArray(stack) ? stack : [];
}

export function normalizePath(path: string): string {
  // Non-strict routing tolerates exactly one trailing slash.
  const trimmed = path.length > 1 ? path.replace(/\/$/, "") : path;
  return (trimmed || "/").toLowerCase();
}

export function listRoutes(app: Express | Application): RouteEntry[] {
  const routes: RouteEntry[] = [];
  walkStack(getRouterStack(app), "", routes);
  routes.sort((a, b) => a.path.localeCompare(b.path) || a.method.localeCompare(b.method));
  return routes;
}

/**
 * Methods served for `path`, in the order the Allow header lists them.
 * HEAD is implied wherever GET is registered.
 */
export function allowedMethodsFor(app: Express | Application, path: string): string[] {
  const target = normalizePath(path);
  const methods = new Set<string>();
  listRoutes(app).forEach((route) => {
    if (normalizePath(route.path) !== target) {
      return;
    }
    methods.add(route.method);
    if (route.method === "GET") {
      methods.add("HEAD");
    }
  });
  return Array.from(methods).sort((a, b) => {
    if (a === "GET") return -1;
    if (b === "GET") return 1;
    return a.localeCompare(b);
  });
}

export function printRoutes(app: Express | Application): void {
  logInfo("routes_registered", { routes: listRoutes(app) });
}
