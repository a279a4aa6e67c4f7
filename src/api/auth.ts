// src/api/auth.ts

import { IncomingMessage } from "http";

/**
 * Simple token auth for the chat API.
 * Token is set via API_TOKEN. If no token is set, the API is open
 * (it binds to loopback by default).
 */
export function isAuthenticated(
  req: IncomingMessage,
  token: string | null,
): boolean {
  if (!token) return true;

  const authHeader = req.headers["authorization"];
  if (authHeader && authHeader === `Bearer ${token}`) return true;

  // Query param, for WebSocket connections
  const query = (req.url || "").split("?")[1];
  if (query && new URLSearchParams(query).get("token") === token) return true;

  return false;
}

export function unauthorizedResponse(): string {
  return JSON.stringify({
    error: "Unauthorized. Pass API_TOKEN as a Bearer token.",
  });
}
