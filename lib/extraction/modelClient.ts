/**
 * Vision model client.
 *
 * Sends one photo plus the extraction prompt to Ollama through its
 * OpenAI-compatible API and returns the raw completion text. Parsing is the
 * response parser's job; retry policy is the caller's.
 */

import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError, NotFoundError } from "openai";
import { getModelTimeoutMs } from "@/lib/config/ollama";
import {
  buildOllamaAuthHeaders,
  getOpenAiCompatibleBaseUrl,
  resolveOllamaHost,
} from "@/lib/ollama/connection";
import { EXTRACTION_ERROR_CODES, ExtractionError } from "./errors";
import { toDataUrl } from "./image";
import { buildExtractionPrompt, SYSTEM_PROMPT } from "./prompt";
import type { HeaderStrategy } from "./types";

export type VisionModelCall = {
  image: Buffer;
  mimeType: string;
  strategy: HeaderStrategy;
  instructions: string;
  model: string;
};

export type VisionModelOptions = {
  host?: string | null;
  timeoutMs?: number;
};

/**
 * OpenAI SDK client configured for Ollama. Ollama ignores the API key, but
 * the SDK requires one; basic auth for proxied endpoints replaces the
 * bearer header.
 */
export function createOllamaOpenAiClient(host: string, timeoutMs: number): OpenAI {
  return new OpenAI({
    apiKey: "ollama",
    baseURL: getOpenAiCompatibleBaseUrl(host),
    defaultHeaders: buildOllamaAuthHeaders(host),
    timeout: timeoutMs,
    maxRetries: 0,
  });
}

/**
 * Ollama lists models with an explicit tag ("llava:latest") while callers
 * often omit it ("llava").
 */
export function modelMatches(requested: string, available: string): boolean {
  const withTag = (name: string) => (name.includes(":") ? name : `${name}:latest`);
  return withTag(requested.trim()) === withTag(available.trim());
}

// 4xx other than 404/408/429 fails the same way on every attempt
// (image-less model, auth proxy)
function isRejectedRequest(status: number | undefined): boolean {
  return status !== undefined && status >= 400 && status < 500 && status !== 429;
}

type CallContext = { host: string; model: string; timeoutMs: number };

function timeoutError(context: CallContext, cause?: unknown): ExtractionError {
  return new ExtractionError(
    EXTRACTION_ERROR_CODES.TIMEOUT,
    `Vision model did not respond within ${context.timeoutMs}ms`,
    { details: { host: context.host, model: context.model }, cause }
  );
}

function toExtractionError(error: unknown, context: CallContext): unknown {
  if (error instanceof ExtractionError) return error;

  // Timeout is a subclass of connection error, so check it first
  if (error instanceof APIConnectionTimeoutError) {
    return timeoutError(context, error);
  }
  if (error instanceof APIConnectionError) {
    return new ExtractionError(
      EXTRACTION_ERROR_CODES.UNREACHABLE_ENDPOINT,
      `Cannot connect to Ollama at ${context.host}`,
      { details: { host: context.host }, cause: error }
    );
  }
  if (error instanceof NotFoundError) {
    return new ExtractionError(
      EXTRACTION_ERROR_CODES.MODEL_UNAVAILABLE,
      `Model "${context.model}" is not available on ${context.host}`,
      { details: { host: context.host, model: context.model }, cause: error }
    );
  }
  if (error instanceof APIError && error.status === 408) {
    return timeoutError(context, error);
  }
  if (error instanceof APIError && isRejectedRequest(error.status)) {
    return new ExtractionError(
      EXTRACTION_ERROR_CODES.MODEL_REQUEST_REJECTED,
      `Ollama rejected the request with status ${error.status}: ${error.message}`,
      { details: { host: context.host, model: context.model, status: error.status }, cause: error }
    );
  }
  if (error instanceof APIError) {
    return new ExtractionError(
      EXTRACTION_ERROR_CODES.UNREACHABLE_ENDPOINT,
      `Ollama returned status ${error.status ?? "unknown"}: ${error.message}`,
      { details: { host: context.host, model: context.model, status: error.status }, cause: error }
    );
  }
  return error;
}

/**
 * Call the vision model once and return its raw text output.
 * timeoutMs bounds the whole call: the model check and the inference share
 * one deadline.
 *
 * @throws ExtractionError UNREACHABLE_ENDPOINT, MODEL_UNAVAILABLE,
 * MODEL_REQUEST_REJECTED or TIMEOUT
 */
export async function callVisionModel(call: VisionModelCall, options: VisionModelOptions = {}): Promise<string> {
  const host = resolveOllamaHost(options.host);
  const timeoutMs = options.timeoutMs ?? getModelTimeoutMs();
  const context = { host, model: call.model, timeoutMs };
  const client = createOllamaOpenAiClient(host, timeoutMs);
  const startedAt = Date.now();

  try {
    const available = await client.models.list();
    const ids = available.data.map((m) => m.id);
    if (!ids.some((id) => modelMatches(call.model, id))) {
      throw new ExtractionError(
        EXTRACTION_ERROR_CODES.MODEL_UNAVAILABLE,
        `Model "${call.model}" is not available on ${host}`,
        { details: { host, model: call.model, available: ids } }
      );
    }

    const prompt = buildExtractionPrompt(call.strategy, call.instructions);
    console.log("[Model Client] Calling vision model:", {
      host,
      model: call.model,
      mode: call.strategy.mode,
      imageBytes: call.image.length,
      mimeType: call.mimeType,
      hasInstructions: call.instructions.trim().length > 0,
    });

    const remainingMs = timeoutMs - (Date.now() - startedAt);
    if (remainingMs <= 0) throw timeoutError(context);

    const response = await client.chat.completions.create(
      {
        model: call.model,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          {
            role: "user",
            content: [
              { type: "text", text: prompt },
              { type: "image_url", image_url: { url: toDataUrl(call.image, call.mimeType) } },
            ],
          },
        ],
        response_format: { type: "json_object" },
        temperature: 0.1,
      },
      { timeout: remainingMs }
    );

    const content = response.choices[0]?.message?.content ?? "";
    console.log("[Model Client] Response received:", {
      model: call.model,
      latencyMs: Date.now() - startedAt,
      chars: content.length,
      preview: content.substring(0, 500),
    });
    return content;
  } catch (error) {
    throw toExtractionError(error, context);
  }
}
