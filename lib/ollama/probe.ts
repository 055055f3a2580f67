/**
 * Connectivity probe for the Ollama endpoint.
 *
 * Unreachability is a status, not an error: probe() never throws for a down,
 * slow or misbehaving endpoint. Results are cached per host for a short
 * window so status polling does not hammer the server.
 */

import { z } from "zod";
import { getDefaultModelName, getStatusCacheMs } from "@/lib/config/ollama";
import { buildOllamaAuthHeaders, resolveOllamaHost } from "./connection";
import { getErrorMessage } from "@/lib/utils/error";

const PROBE_TIMEOUT_MS = 5000;

export type ProbeStatus = "online" | "offline";

export type OllamaModelInfo = {
  name: string;
  size: number; // bytes
  modifiedAt: string;
  family: string;
  families: string[];
  format: string;
  parameterSize: string;
  quantizationLevel: string;
};

export type ProbeResult = {
  status: ProbeStatus;
  host: string;
  currentModel: string;
  models: OllamaModelInfo[];
  message: string;
  checkedAt: string; // ISO timestamp
};

const tagsModelSchema = z.object({
  name: z.string().optional(),
  model: z.string().optional(),
  size: z.number().optional(),
  modified_at: z.string().optional(),
  family: z.string().optional(),
  format: z.string().optional(),
  families: z.array(z.string()).nullable().optional(),
  parameter_size: z.string().optional(),
  quantization_level: z.string().optional(),
  details: z
    .object({
      format: z.string().optional(),
      family: z.string().optional(),
      families: z.array(z.string()).nullable().optional(),
      parameter_size: z.string().optional(),
      quantization_level: z.string().optional(),
    })
    .optional(),
});

const tagsResponseSchema = z.object({
  models: z.array(z.unknown()).optional(),
});

// Callers can name any host, so the cache is bounded: expired entries are
// dropped on every probe and the oldest host goes once the cap is reached.
const MAX_CACHED_HOSTS = 32;

const probeCache = new Map<string, { result: ProbeResult; expiresAt: number }>();

export function clearProbeCache(): void {
  probeCache.clear();
}

export function probeCacheSize(): number {
  return probeCache.size;
}

function pruneProbeCache(now: number): void {
  for (const [host, entry] of probeCache) {
    if (entry.expiresAt <= now) probeCache.delete(host);
  }
}

function cacheProbeResult(host: string, result: ProbeResult, expiresAt: number): void {
  probeCache.delete(host);
  while (probeCache.size >= MAX_CACHED_HOSTS) {
    const oldest = probeCache.keys().next();
    if (oldest.done) break;
    probeCache.delete(oldest.value);
  }
  probeCache.set(host, { result, expiresAt });
}

/**
 * Map one entry of /api/tags into OllamaModelInfo.
 * Newer Ollama versions nest metadata under `details`; older ones put it at
 * the top level. Returns null for entries without a usable name.
 */
export function toModelInfo(entry: unknown): OllamaModelInfo | null {
  const parsed = tagsModelSchema.safeParse(entry);
  if (!parsed.success) {
    console.warn("[Ollama Probe] Skipping unrecognized model entry:", parsed.error.issues[0]?.message);
    return null;
  }
  const m = parsed.data;
  const name = m.name || m.model || "";
  if (!name) return null;

  return {
    name,
    size: m.size ?? 0,
    modifiedAt: m.modified_at ?? "",
    family: m.details?.family ?? m.family ?? "",
    families: m.details?.families ?? m.families ?? [],
    format: m.details?.format ?? m.format ?? "",
    parameterSize: m.details?.parameter_size ?? m.parameter_size ?? "",
    quantizationLevel: m.details?.quantization_level ?? m.quantization_level ?? "",
  };
}

function offline(host: string, message: string): ProbeResult {
  return {
    status: "offline",
    host,
    currentModel: getDefaultModelName(),
    models: [],
    message,
    checkedAt: new Date().toISOString(),
  };
}

async function runProbe(host: string): Promise<ProbeResult> {
  let response: Response;
  try {
    response = await fetch(`${host}/api/tags`, {
      headers: buildOllamaAuthHeaders(host),
      signal: AbortSignal.timeout(PROBE_TIMEOUT_MS),
    });
  } catch (error) {
    if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
      return offline(host, "Connection to Ollama timed out");
    }
    console.warn("[Ollama Probe] Cannot connect:", { host, error: getErrorMessage(error) });
    return offline(host, "Cannot connect to Ollama");
  }

  if (!response.ok) {
    return offline(host, `Ollama returned status code ${response.status}`);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    return offline(host, `Ollama returned an unreadable model list: ${getErrorMessage(error)}`);
  }

  const tags = tagsResponseSchema.safeParse(body);
  if (!tags.success) {
    return offline(host, "Ollama returned an unexpected model list");
  }

  const models = (tags.data.models ?? [])
    .map(toModelInfo)
    .filter((m): m is OllamaModelInfo => m !== null);

  return {
    status: "online",
    host,
    currentModel: getDefaultModelName(),
    models,
    message: "Ollama is running",
    checkedAt: new Date().toISOString(),
  };
}

/**
 * Check whether the Ollama endpoint is reachable and list its models.
 *
 * @param options.host Override for OLLAMA_HOST
 * @param options.fresh Skip the status cache
 */
export async function probe(options: { host?: string | null; fresh?: boolean } = {}): Promise<ProbeResult> {
  const host = resolveOllamaHost(options.host);
  const now = Date.now();
  pruneProbeCache(now);

  if (!options.fresh) {
    const cached = probeCache.get(host);
    if (cached) return cached.result;
  }

  const result = await runProbe(host);
  console.log("[Ollama Probe] Result:", {
    host,
    status: result.status,
    modelCount: result.models.length,
    message: result.message,
  });

  const ttl = getStatusCacheMs();
  if (ttl > 0) {
    cacheProbeResult(host, result, now + ttl);
  }
  return result;
}
