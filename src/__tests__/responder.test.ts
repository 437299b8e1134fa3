import request from "supertest";
import { createApp } from "../app";
import { API_ROOT_PAYLOAD, HEALTH_PAYLOAD, ROOT_PAYLOAD } from "../responses/payloads";

const JSON_CONTENT_TYPE = "application/json; charset=utf-8";

describe("static responder routes", () => {
  const app = createApp();

  it("greets on GET /", async () => {
    const res = await request(app).get("/");

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toBe(JSON_CONTENT_TYPE);
    expect(res.text).toBe('{"hello":"world","docs":"/docs"}');
  });

  it("answers GET /api", async () => {
    const res = await request(app).get("/api");

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toBe(JSON_CONTENT_TYPE);
    expect(res.body).toEqual({ ok: true, msg: "FastAPI running on Vercel" });
  });

  it("reports health on GET /api/health", async () => {
    const res = await request(app).get("/api/health");

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toBe(JSON_CONTENT_TYPE);
    expect(res.text).toBe('{"status":"healthy"}');
  });

  it("returns byte-identical bodies for repeated requests", async () => {
    const first = await request(app).get("/api");
    const second = await request(app).get("/api");
    const third = await request(app).get("/api");

    expect(second.text).toBe(first.text);
    expect(third.text).toBe(first.text);
    expect(first.headers["content-length"]).toBe(second.headers["content-length"]);
  });

  it("ignores query strings, bodies and arbitrary headers", async () => {
    const res = await request(app)
      .get("/api/health?verbose=1")
      .set("Authorization", "Bearer test-secret")
      .set("X-Extra", "value");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "healthy" });
  });

  it("tolerates a trailing slash", async () => {
    const res = await request(app).get("/api/");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true, msg: "FastAPI running on Vercel" });
  });

  it("answers HEAD with the GET headers and no body", async () => {
    const res = await request(app).head("/api/health");

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toBe(JSON_CONTENT_TYPE);
    expect(res.text).toBeFalsy();
  });

  it("keeps the payload objects frozen", () => {
    expect(Object.isFrozen(ROOT_PAYLOAD)).toBe(true);
    expect(Object.isFrozen(API_ROOT_PAYLOAD)).toBe(true);
    expect(Object.isFrozen(HEALTH_PAYLOAD)).toBe(true);
    expect(ROOT_PAYLOAD.docs).toBe("/docs");
  });
});
