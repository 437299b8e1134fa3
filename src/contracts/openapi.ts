import bundledContract from "../../contracts/openapi.json";

type MediaType = { schema?: unknown };

export type OpenApiOperation = {
  summary?: string;
  operationId?: string;
  responses?: Record<string, { description?: string; content?: Record<string, MediaType> }>;
};

export type OpenApiDoc = {
  openapi: string;
  info: { title: string; version: string };
  paths: Record<string, Record<string, OpenApiOperation>>;
  components?: { schemas?: Record<string, unknown> };
};

let cachedDoc: OpenApiDoc | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function assertOpenApiDoc(value: unknown): asserts value is OpenApiDoc {
  if (!isRecord(value)) {
    throw new Error("OpenAPI document must be a JSON object.");
  }
  if (typeof value.openapi !== "string") {
    throw new Error("OpenAPI document is missing the `openapi` version field.");
  }
  const info = value.info;
  if (!isRecord(info) || typeof info.title !== "string" || typeof info.version !== "string") {
    throw new Error("OpenAPI document must declare info.title and info.version.");
  }
  if (!isRecord(value.paths)) {
    throw new Error("OpenAPI document must declare `paths`.");
  }
}

export function parseOpenApi(source: string): OpenApiDoc {
  const parsed: unknown = JSON.parse(source);
  assertOpenApiDoc(parsed);
  return parsed;
}

/**
 * The contract shipped beside the sources, bundled at build time so the
 * serverless handler does not depend on the working directory. Validated
 * once per process; later calls return the same object.
 */
export function loadOpenApi(): OpenApiDoc {
  if (!cachedDoc) {
    const value: unknown = bundledContract;
    assertOpenApiDoc(value);
    cachedDoc = value;
  }
  return cachedDoc;
}

export function openApiPathToExpress(path: string): string {
  return path.replace(/\{([^}]+)\}/g, ":$1");
}

export function getSuccessSchema(operation: OpenApiOperation): unknown {
  const responses = operation.responses ?? {};
  const preferred = responses["200"] ?? responses["201"] ?? responses.default;
  return preferred?.content?.["application/json"]?.schema;
}

export function resolveSchemaRefs(schema: unknown, doc: OpenApiDoc): unknown {
  if (Array.isArray(schema)) {
    return schema.map((entry) => resolveSchemaRefs(entry, doc));
  }
  if (!isRecord(schema)) {
    return schema;
  }
  const ref = typeof schema.$ref === "string" ? schema.$ref : null;
  if (ref && ref.startsWith("#/components/schemas/")) {
    const key = ref.replace("#/components/schemas/", "");
    const target = doc.components?.schemas?.[key];
    if (target === undefined) {
      throw new Error(`Unresolved schema reference: ${ref}`);
    }
    return resolveSchemaRefs(target, doc);
  }
  const next: Record<string, unknown> = {};
  Object.entries(schema).forEach(([k, v]) => {
    if (k === "$schema" || k === "$id") {
      return;
    }
    next[k] = resolveSchemaRefs(v, doc);
  });
  return next;
}
