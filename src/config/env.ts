import dotenv from "dotenv";
import { logError, logWarn } from "../observability/logger";

dotenv.config();

const DEFAULT_HOST = "0.0.0.0";
const DEFAULT_PORT = 3000;

type EnvConfig = {
  nodeEnv: string;
  host: string;
  port: number;
  corsAllowlist: string[];
  contractGuardEnabled: boolean;
  printRoutes: boolean;
  trustProxy: boolean;
};

let cachedEnv: EnvConfig | null = null;

export function isTestEnv(): boolean {
  return process.env.NODE_ENV === "test";
}

export function isProductionEnv(): boolean {
  return process.env.NODE_ENV === "production";
}

function getEnvValue(key: string): string | undefined {
  const value = process.env[key];
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

function parsePort(value: string | undefined): number | null {
  if (!value) {
    return null;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65_535) {
    return null;
  }
  return parsed;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return fallback;
}

function parseCsv(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  const entries = value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
  return entries.length > 0 ? entries : fallback;
}

function resolvePort(): number {
  const rawPort = getEnvValue("PORT");
  if (!rawPort) {
    return DEFAULT_PORT;
  }
  const port = parsePort(rawPort);
  if (port === null) {
    logWarn("port_invalid_defaulting", { value: rawPort, fallback: DEFAULT_PORT });
    return DEFAULT_PORT;
  }
  return port;
}

/**
 * Production-only sanity checks. Outside production every value has a
 * usable fallback, so nothing is enforced.
 */
export function assertEnv(): void {
  if (!isProductionEnv()) {
    return;
  }

  const problems: string[] = [];

  const rawPort = getEnvValue("PORT");
  if (rawPort && parsePort(rawPort) === null) {
    problems.push(`PORT must be an integer between 0 and 65535, got: ${rawPort}`);
  }

  const allowlist = parseCsv(getEnvValue("CORS_ALLOWED_ORIGINS"), ["*"]);
  if (allowlist.includes("*") && allowlist.length > 1) {
    problems.push("CORS_ALLOWED_ORIGINS must not mix a wildcard with explicit origins.");
  }

  if (problems.length > 0) {
    logError("invalid_env", { problems });
    throw new Error(`Invalid environment: ${problems.join(" ")}`);
  }
}

export function getEnvConfig(): EnvConfig {
  const currentNodeEnv = getEnvValue("NODE_ENV") ?? "";
  const shouldCache = !isTestEnv();
  if (shouldCache && cachedEnv && cachedEnv.nodeEnv === currentNodeEnv) {
    return cachedEnv;
  }

  const config: EnvConfig = {
    nodeEnv: currentNodeEnv,
    host: getEnvValue("HOST") ?? DEFAULT_HOST,
    port: resolvePort(),
    corsAllowlist: parseCsv(getEnvValue("CORS_ALLOWED_ORIGINS"), ["*"]),
    contractGuardEnabled:
      !isProductionEnv() && parseBoolean(getEnvValue("CONTRACT_GUARD_ENABLED"), true),
    printRoutes: parseBoolean(getEnvValue("PRINT_ROUTES"), false),
    trustProxy: parseBoolean(getEnvValue("TRUST_PROXY"), true),
  };

  if (shouldCache) {
    cachedEnv = config;
  }

  return config;
}

export function resetEnvConfig(): void {
  cachedEnv = null;
}

export function getCorsAllowlist(): string[] {
  return getEnvConfig().corsAllowlist;
}

export function isContractGuardEnabled(): boolean {
  return getEnvConfig().contractGuardEnabled;
}

export function shouldPrintRoutes(): boolean {
  return getEnvConfig().printRoutes;
}

export function getListenAddress(): { host: string; port: number } {
  const { host, port } = getEnvConfig();
  return { host, port };
}
