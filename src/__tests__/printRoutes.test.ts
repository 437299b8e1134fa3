import express from "express";
import { createApp, registerFallbackHandlers } from "../app";
import { resetEnvConfig } from "../config/env";
import { allowedMethodsFor, listRoutes, normalizePath, printRoutes } from "../debug/printRoutes";

describe("route inventory", () => {
  const app = createApp();

  it("lists every mounted route sorted by path", () => {
    expect(listRoutes(app)).toEqual([
      { method: "GET", path: "/" },
      { method: "GET", path: "/api" },
      { method: "GET", path: "/api/health" },
      { method: "GET", path: "/docs" },
      { method: "GET", path: "/openapi.json" },
      { method: "GET", path: "/redoc" },
    ]);
  });

  it("reports the methods a path serves", () => {
    expect(allowedMethodsFor(app, "/api/health")).toEqual(["GET", "HEAD"]);
    expect(allowedMethodsFor(app, "/API/")).toEqual(["GET", "HEAD"]);
    expect(allowedMethodsFor(app, "/missing")).toEqual([]);
  });

  it("normalizes trailing slashes and case", () => {
    expect(normalizePath("/")).toBe("/");
    expect(normalizePath("/Api/")).toBe("/api");
    expect(normalizePath("/api//")).toBe("/api/");
    expect(normalizePath("")).toBe("/");
  });

  it("logs the inventory", () => {
    process.env.TEST_LOGGING = "true";
    const lines: string[] = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk) => {
      lines.push(String(chunk));
      return true;
    });

    try {
      printRoutes(app);
    } finally {
      vi.restoreAllMocks();
      delete process.env.TEST_LOGGING;
    }

    expect(lines).toHaveLength(1);
    const payload = JSON.parse(lines[0] ?? "");
    expect(payload.event).toBe("routes_registered");
    expect(payload.routes).toHaveLength(6);
  });
});

describe("route inventory on a bare app", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    delete process.env.TEST_LOGGING;
    delete process.env.PRINT_ROUTES;
    resetEnvConfig();
  });

  it("reads routes from the callable Express router", () => {
    const app = express();
    app.get("/ping", (_req, res) => {
      res.json({ pong: true });
    });

    expect(listRoutes(app)).toEqual([{ method: "GET", path: "/ping" }]);
  });

  it("logs routes_registered when PRINT_ROUTES is enabled", () => {
    process.env.TEST_LOGGING = "true";
    process.env.PRINT_ROUTES = "true";
    resetEnvConfig();
    const lines: string[] = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk) => {
      lines.push(String(chunk));
      return true;
    });
    const app = express();
    app.get("/ping", (_req, res) => {
      res.json({ pong: true });
    });

    registerFallbackHandlers(app);

    expect(lines).toHaveLength(1);
    const payload = JSON.parse(lines[0] ?? "");
    expect(payload.event).toBe("routes_registered");
    expect(payload.routes).toEqual([{ method: "GET", path: "/ping" }]);
  });

  it("stays quiet when PRINT_ROUTES is unset", () => {
    process.env.TEST_LOGGING = "true";
    resetEnvConfig();
    const lines: string[] = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk) => {
      lines.push(String(chunk));
      return true;
    });

    registerFallbackHandlers(express());

    expect(lines).toHaveLength(0);
  });
});
