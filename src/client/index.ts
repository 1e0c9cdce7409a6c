// ============================================================================
// DUSK CLIENT
// ============================================================================
// Client for connecting to the dusk server from a chat transport or script.
// Queries and mutations go over HTTP; notification subscriptions need a
// WebSocket, opened only when a caller asks for one.

import { createTRPCProxyClient, httpBatchLink, createWSClient, wsLink, splitLink, type CreateTRPCProxyClient } from "@trpc/client";
import { WebSocket as NodeWebSocket } from "ws";
import type { AppRouter } from "../server/router.js";
import type { Notification } from "../types/index.js";

// Re-export types for consumers
export type { AppRouter } from "../server/router.js";
export * from "../types/index.js";

export const DEFAULT_SERVER_URL = "http://localhost:3847";

export type NotificationSocket = ReturnType<typeof createWSClient>;

// ============================================================================
// CLIENT OPTIONS
// ============================================================================

export interface DuskClientOptions {
  /** Server URL (default: http://localhost:3847) */
  url?: string;
  /** Socket for subscriptions; without one the client is HTTP only */
  socket?: NotificationSocket;
  /** Custom headers to send with requests */
  headers?: Record<string, string>;
}

/**
 * The WebSocket address of an HTTP server URL (http → ws, https → wss)
 */
export function toWebSocketUrl(url: string): string {
  return url.replace(/^http/, "ws");
}

/**
 * Open the socket notification subscriptions run over. Node 20 has no global
 * WebSocket, so the ws implementation is installed when it is missing.
 */
export function openNotificationSocket(url = DEFAULT_SERVER_URL): NotificationSocket {
  if (!("WebSocket" in globalThis)) {
    Object.assign(globalThis, { WebSocket: NodeWebSocket });
  }
  return createWSClient({ url: toWebSocketUrl(url) });
}

// ============================================================================
// CREATE CLIENT
// ============================================================================

/**
 * Create a typed tRPC client for the dusk server.
 *
 * @example
 * ```typescript
 * const client = createDuskClient({ url: "http://localhost:3847" });
 *
 * const { reply } = await client.chat.send.mutate({ userId: "u1", text: "add task buy milk" });
 * const stats = await client.task.analytics.query({ userId: "u1" });
 * ```
 */
export function createDuskClient(options: DuskClientOptions = {}): CreateTRPCProxyClient<AppRouter> {
  const url = options.url ?? DEFAULT_SERVER_URL;
  const http = httpBatchLink({ url, headers: options.headers });

  if (!options.socket) {
    return createTRPCProxyClient<AppRouter>({ links: [http] });
  }

  return createTRPCProxyClient<AppRouter>({
    links: [
      splitLink({
        condition: (op) => op.type === "subscription",
        true: wsLink({ client: options.socket }),
        false: http,
      }),
    ],
  });
}

// ============================================================================
// CONVENIENCE FUNCTIONS
// ============================================================================

/**
 * Quick helper to check if the server is running
 */
export async function checkServerHealth(url = DEFAULT_SERVER_URL): Promise<boolean> {
  try {
    const client = createDuskClient({ url });
    const health = await client.system.health.query();
    return health.status === "ok";
  } catch {
    return false;
  }
}

export interface WatchOptions {
  url?: string;
  userId: string;
  onNotification: (notification: Notification) => void;
  onError: (message: string) => void;
}

/**
 * Stream one user's notifications. Returns a function that unsubscribes and
 * closes the socket.
 *
 * @example
 * ```typescript
 * const stop = watchNotifications({
 *   userId: "u1",
 *   onNotification: (n) => console.log(n.text),
 *   onError: (message) => console.error(message),
 * });
 * ```
 */
export function watchNotifications(options: WatchOptions): () => void {
  const socket = openNotificationSocket(options.url);
  const client = createDuskClient({ url: options.url, socket });

  const subscription = client.notifications.onNotification.subscribe(
    { userId: options.userId },
    {
      onData: options.onNotification,
      onError: (error) => options.onError(error.message),
    }
  );

  return () => {
    subscription.unsubscribe();
    socket.close();
  };
}
