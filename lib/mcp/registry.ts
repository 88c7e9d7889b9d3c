/**
 * Active SSE sessions, kept on globalThis so the SSE route and the messages
 * route see the same map across Next.js module instances and HMR.
 */
import type { NextSSETransport } from "./transport";

declare global {
  // eslint-disable-next-line no-var
  var __mcpTransports: Map<string, NextSSETransport> | undefined;
}

if (!globalThis.__mcpTransports) {
  globalThis.__mcpTransports = new Map<string, NextSSETransport>();
}

export const activeTransports: Map<string, NextSSETransport> = globalThis.__mcpTransports;
