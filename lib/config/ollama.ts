/**
 * Ollama endpoint configuration.
 *
 * Everything is read from the environment on each call so tests and
 * long-running servers pick up changes without a restart.
 */

const DEFAULT_OLLAMA_HOST = "http://localhost:11434";
const DEFAULT_OLLAMA_MODEL = "qwen2.5vl:7b";
const DEFAULT_TIMEOUT_MS = 120_000;
const DEFAULT_STATUS_CACHE_MS = 10_000;
const DEFAULT_CONFIDENCE_THRESHOLD = 0.7;

function readPositiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw || raw.trim() === "") return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value < 0) {
    console.warn(`[Config] Ignoring invalid ${name}=${JSON.stringify(raw)}, using ${fallback}`);
    return fallback;
  }
  return value;
}

/**
 * Base URL of the Ollama server, without a trailing slash.
 */
export function getOllamaHost(): string {
  return (process.env.OLLAMA_HOST || DEFAULT_OLLAMA_HOST).trim().replace(/\/+$/, "");
}

/**
 * Basic auth credentials for a proxied Ollama endpoint.
 * Returns null unless both username and password are set.
 */
export function getOllamaCredentials(): { username: string; password: string } | null {
  const username = process.env.OLLAMA_USERNAME || "";
  const password = process.env.OLLAMA_PASSWORD || "";
  if (!username || !password) return null;
  return { username, password };
}

/**
 * Vision model used when a request does not name one.
 */
export function getDefaultModelName(): string {
  return process.env.OLLAMA_MODEL || DEFAULT_OLLAMA_MODEL;
}

/**
 * Upper bound on a single inference call, in milliseconds.
 */
export function getModelTimeoutMs(): number {
  return readPositiveInt("OLLAMA_TIMEOUT_MS", DEFAULT_TIMEOUT_MS);
}

/**
 * How long a probe result is reused for the same host.
 */
export function getStatusCacheMs(): number {
  return readPositiveInt("OLLAMA_STATUS_CACHE_MS", DEFAULT_STATUS_CACHE_MS);
}

/**
 * Confidence below which a cell is flagged for review.
 */
export function getConfidenceThreshold(): number {
  const raw = process.env.CONFIDENCE_THRESHOLD;
  if (!raw || raw.trim() === "") return DEFAULT_CONFIDENCE_THRESHOLD;
  const value = Number.parseFloat(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    console.warn(
      `[Config] Ignoring invalid CONFIDENCE_THRESHOLD=${JSON.stringify(raw)}, using ${DEFAULT_CONFIDENCE_THRESHOLD}`
    );
    return DEFAULT_CONFIDENCE_THRESHOLD;
  }
  return value;
}
