/**
 * Shared connection details for talking to an Ollama server, whether through
 * its native API (/api/*) or its OpenAI-compatible API (/v1/*).
 */

import { getOllamaCredentials, getOllamaHost } from "@/lib/config/ollama";

/**
 * Normalize a host given by a caller, falling back to OLLAMA_HOST.
 * Adds http:// when no scheme is present.
 */
export function resolveOllamaHost(host?: string | null): string {
  const candidate = host?.trim() ? host.trim() : getOllamaHost();
  const withScheme = /^https?:\/\//i.test(candidate) ? candidate : `http://${candidate}`;
  return withScheme.replace(/\/+$/, "");
}

/**
 * True when the (normalized) host is the one named by OLLAMA_HOST.
 */
export function isConfiguredHost(host: string): boolean {
  return resolveOllamaHost(host) === resolveOllamaHost();
}

/**
 * Authorization header for basic auth, or an empty object when no
 * credentials are configured. Credentials belong to OLLAMA_HOST only; any
 * other host, such as one passed in a request, gets none.
 */
export function buildOllamaAuthHeaders(host: string): Record<string, string> {
  const credentials = getOllamaCredentials();
  if (!credentials || !isConfiguredHost(host)) return {};
  const token = Buffer.from(`${credentials.username}:${credentials.password}`, "utf8").toString("base64");
  return { Authorization: `Basic ${token}` };
}

/**
 * Base URL for the OpenAI SDK pointed at Ollama.
 */
export function getOpenAiCompatibleBaseUrl(host: string): string {
  return `${host}/v1`;
}
