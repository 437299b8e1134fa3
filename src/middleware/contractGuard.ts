import type { NextFunction, Request, RequestHandler, Response } from "express";
import Ajv, { type SchemaObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import {
  getSuccessSchema,
  openApiPathToExpress,
  resolveSchemaRefs,
  type OpenApiDoc,
} from "../contracts/openapi";

export type ContractGuardOptions = {
  enabled: boolean;
};

export class ContractViolationError extends Error {
  readonly route: string;
  readonly errors: unknown;

  constructor(route: string, errors: unknown) {
    super(`Contract guard response mismatch for ${route}: ${JSON.stringify(errors)}`);
    this.name = "ContractViolationError";
    this.route = route;
    this.errors = errors;
  }
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeRoutePath(path: string): string {
  if (path.length > 1 && path.endsWith("/")) {
    return path.slice(0, -1);
  }
  return path || "/";
}

export function compileValidators(doc: OpenApiDoc): Map<string, ValidateFunction> {
  const ajv = new Ajv({ allErrors: true, strict: false });
  addFormats(ajv);

  const validators = new Map<string, ValidateFunction>();
  Object.entries(doc.paths).forEach(([openApiPath, operations]) => {
    Object.entries(operations).forEach(([method, operation]) => {
      const schema = getSuccessSchema(operation);
      if (!schema) {
        return;
      }
      const resolved = resolveSchemaRefs(schema, doc);
      if (!isSchemaObject(resolved)) {
        return;
      }
      const key = `${method.toUpperCase()} ${openApiPathToExpress(openApiPath)}`;
      validators.set(key, ajv.compile(resolved));
    });
  });
  return validators;
}

/**
 * Validates successful JSON bodies against the 200 schema of the matched
 * operation. A mismatch is raised as a ContractViolationError and reaches
 * the error handler like any other thrown error.
 */
export function createContractGuard(
  doc: OpenApiDoc,
  options: ContractGuardOptions
): RequestHandler {
  if (!options.enabled) {
    return (_req: Request, _res: Response, next: NextFunction) => next();
  }

  const validators = compileValidators(doc);

  return (req: Request, res: Response, next: NextFunction) => {
    const originalJson = res.json.bind(res);
    res.json = function guardedJson(body?: unknown) {
      res.json = originalJson;
      if (res.statusCode >= 300 || !req.route) {
        return originalJson(body);
      }
      const method = req.method === "HEAD" ? "GET" : req.method.toUpperCase();
      const routePath = normalizeRoutePath(
        `${req.baseUrl}${String(req.route.path)}`.toLowerCase()
      );
      const key = `${method} ${routePath}`;
      const validate = validators.get(key);
      if (validate && !validate(body)) {
        throw new ContractViolationError(key, validate.errors);
      }
      return originalJson(body);
    };
    next();
  };
}
