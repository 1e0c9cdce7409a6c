// ============================================================================
// SERVER ENTRY POINT
// ============================================================================
// HTTP server exposing the tRPC API, with a WebSocket endpoint for
// notification subscriptions. The scheduler runs in the same process.

import { createHTTPServer } from "@trpc/server/adapters/standalone";
import { applyWSSHandler } from "@trpc/server/adapters/ws";
import { WebSocketServer } from "ws";

import { appRouter } from "./router.js";
import { TRPCContext } from "./trpc.js";
import { NotificationHub } from "./hub.js";
import { AppContext, AppOverrides, createAppContext } from "../app/context.js";
import { DuskConfig } from "../types/index.js";
import { loadConfig } from "../config/index.js";
import { getStorageTypeName } from "../storage/index.js";
import { createLogger } from "../logging/index.js";

export { appRouter } from "./router.js";
export type { AppRouter } from "./router.js";
export type { TRPCContext } from "./trpc.js";
export { NotificationHub } from "./hub.js";

const log = createLogger("server");

// ============================================================================
// SERVER OPTIONS
// ============================================================================

export interface ServerOptions {
  port?: number;
  host?: string;
  enableWebSocket?: boolean;
  enableScheduler?: boolean;
  config?: DuskConfig;
  overrides?: Omit<AppOverrides, "notifier">;
}

// ============================================================================
// CREATE SERVER
// ============================================================================

export interface DuskServer {
  start(): Promise<void>;
  stop(): Promise<void>;
  getPort(): number;
  getApp(): AppContext;
}

export async function createServer(options: ServerOptions = {}): Promise<DuskServer> {
  const config = options.config ?? loadConfig();
  const port = options.port ?? config.server.port;
  const host = options.host ?? config.server.host;
  const enableWebSocket = options.enableWebSocket ?? true;
  const enableScheduler = options.enableScheduler ?? config.scheduler.enabled;

  const hub = new NotificationHub();
  const app = await createAppContext(config, { ...options.overrides, notifier: hub });

  const createContext = (): TRPCContext => ({ app, hub });

  const httpServer = createHTTPServer({
    router: appRouter,
    createContext,
    responseMeta() {
      return {
        headers: {
          "Access-Control-Allow-Origin": "*",
          "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
          "Access-Control-Allow-Headers": "Content-Type, Authorization",
        },
      };
    },
  });

  let wss: WebSocketServer | null = null;
  let wssHandler: ReturnType<typeof applyWSSHandler> | null = null;

  if (enableWebSocket) {
    wss = new WebSocketServer({ server: httpServer.server });
    wssHandler = applyWSSHandler({
      wss,
      router: appRouter,
      createContext,
    });
  }

  return {
    async start() {
      await new Promise<void>((resolve) => {
        httpServer.server.listen(port, host, () => resolve());
      });
      console.log(`\x1b[32m✓ Dusk server running at http://${host}:${port}\x1b[0m`);
      if (enableWebSocket) {
        console.log(`\x1b[32m✓ WebSocket enabled at ws://${host}:${port}\x1b[0m`);
      }
      console.log(`\x1b[90m  Storage: ${getStorageTypeName(config.storage)}\x1b[0m`);
      console.log(`\x1b[90m  LLM: ${config.llm.provider}\x1b[0m`);

      if (enableScheduler) app.scheduler.start();
    },

    async stop() {
      if (wssHandler) {
        wssHandler.broadcastReconnectNotification();
      }
      if (wss) {
        wss.close();
      }
      await new Promise<void>((resolve) => {
        httpServer.server.close(() => resolve());
      });
      await app.close();
      log.info("Server stopped");
    },

    getPort() {
      return port;
    },

    getApp() {
      return app;
    },
  };
}

// ============================================================================
// CLI ENTRY POINT
// ============================================================================

export async function startServerCLI(port?: number): Promise<void> {
  const server = await createServer({ port });

  const shutdown = (signal: string) => {
    console.log(`\n\x1b[33mShutting down (${signal})...\x1b[0m`);
    server
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error("Shutdown failed", error);
        process.exit(1);
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  await server.start();
}
