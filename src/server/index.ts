import type { Server } from "http";
import type express from "express";
import { createApp } from "../app";
import { assertEnv, getListenAddress } from "../config/env";
import { logError, logInfo } from "../observability/logger";

let processHandlersInstalled = false;
let server: Server | null = null;

function installProcessHandlers(): void {
  if (processHandlersInstalled) return;
  processHandlersInstalled = true;

  process.on("unhandledRejection", (err) => {
    logError("unhandled_rejection", { err });
  });

  process.on("uncaughtException", (err) => {
    logError("uncaught_exception", { err });
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    handleShutdownSignal(signal).then((code) => process.exit(code));
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}

/** Stops the listener for `signal` and resolves the process exit code. */
export async function handleShutdownSignal(signal: NodeJS.Signals): Promise<number> {
  try {
    await stopServer(signal);
    return 0;
  } catch (err) {
    logError("server_stop_failed", { signal, err });
    return 1;
  }
}

export function stopServer(reason = "shutdown"): Promise<void> {
  const current = server;
  if (!current) {
    return Promise.resolve();
  }
  server = null;
  logInfo("server_stopping", { reason });
  return new Promise((resolve, reject) => {
    current.close((err) => {
      if (err) {
        reject(err);
        return;
      }
      logInfo("server_stopped", { reason });
      resolve();
    });
  });
}

export async function startServer(app?: express.Express): Promise<Server> {
  if (server) {
    return server;
  }

  installProcessHandlers();
  assertEnv();
  const handler = app ?? createApp();

  const { host, port } = getListenAddress();
  const listener = await new Promise<Server>((resolve, reject) => {
    const instance = handler.listen(port, host, () => resolve(instance));
    instance.once("error", reject);
  });

  server = listener;
  const address = listener.address();
  logInfo("server_listening", {
    host,
    port: typeof address === "object" && address ? address.port : port,
  });
  return listener;
}

if (require.main === module) {
  startServer().catch((err: unknown) => {
    logError("server_start_failed", { err });
    process.exitCode = 1;
  });
}
