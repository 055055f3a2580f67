/**
 * Unit tests for the vision model client.
 *
 * The OpenAI SDK is mocked; its error classes are the real ones so the
 * mapping to extraction error codes is exercised as in production.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  APIConnectionError,
  APIConnectionTimeoutError,
  AuthenticationError,
  BadRequestError,
  InternalServerError,
  NotFoundError,
  RateLimitError,
} from "openai";

const mocks = vi.hoisted(() => ({
  construct: vi.fn(),
  list: vi.fn(),
  create: vi.fn(),
}));

vi.mock("openai", async (importOriginal) => {
  const actual = await importOriginal<typeof import("openai")>();
  class MockOpenAI {
    models = { list: mocks.list };
    chat = { completions: { create: mocks.create } };
    constructor(options: unknown) {
      mocks.construct(options);
    }
  }
  return { ...actual, default: MockOpenAI };
});

import { callVisionModel, modelMatches, type VisionModelCall } from "@/lib/extraction/modelClient";
import { SYSTEM_PROMPT } from "@/lib/extraction/prompt";
import { ExtractionError, isRetryableError } from "@/lib/extraction/errors";

const HOST = "http://ollama.test:11434";
const PNG = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

const call: VisionModelCall = {
  image: PNG,
  mimeType: "image/png",
  strategy: { mode: "specify", headers: ["name", "email"] },
  instructions: "",
  model: "qwen2.5vl:7b",
};

async function captureError(promise: Promise<unknown>): Promise<ExtractionError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ExtractionError) return error;
    throw error;
  }
  throw new Error("expected the call to fail");
}

describe("callVisionModel", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.stubEnv("OLLAMA_USERNAME", "");
    vi.stubEnv("OLLAMA_PASSWORD", "");
    mocks.list.mockResolvedValue({ data: [{ id: "qwen2.5vl:7b" }, { id: "llava:latest" }] });
    mocks.create.mockResolvedValue({ choices: [{ message: { content: '{"headers":[],"rows":[]}' } }] });
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("should return the raw completion text", async () => {
    await expect(callVisionModel(call, { host: HOST, timeoutMs: 5000 })).resolves.toBe('{"headers":[],"rows":[]}');
  });

  it("should point the SDK at the OpenAI-compatible endpoint without retries", async () => {
    await callVisionModel(call, { host: HOST, timeoutMs: 5000 });

    expect(mocks.construct).toHaveBeenCalledWith(
      expect.objectContaining({
        baseURL: "http://ollama.test:11434/v1",
        timeout: 5000,
        maxRetries: 0,
        defaultHeaders: {},
      })
    );
  });

  it("should send basic auth to the configured host", async () => {
    vi.stubEnv("OLLAMA_HOST", HOST);
    vi.stubEnv("OLLAMA_USERNAME", "user");
    vi.stubEnv("OLLAMA_PASSWORD", "test-secret");

    await callVisionModel(call, { host: HOST, timeoutMs: 5000 });

    const token = Buffer.from("user:test-secret").toString("base64");
    expect(mocks.construct).toHaveBeenCalledWith(
      expect.objectContaining({ defaultHeaders: { Authorization: `Basic ${token}` } })
    );
  });

  it("should not send credentials to a host other than the configured one", async () => {
    vi.stubEnv("OLLAMA_HOST", HOST);
    vi.stubEnv("OLLAMA_USERNAME", "user");
    vi.stubEnv("OLLAMA_PASSWORD", "test-secret");

    await callVisionModel(call, { host: "http://elsewhere.test:11434", timeoutMs: 5000 });

    expect(mocks.construct).toHaveBeenCalledWith(expect.objectContaining({ defaultHeaders: {} }));
  });

  it("should send the prompt and the image in one JSON-mode request", async () => {
    await callVisionModel(call, { host: HOST, timeoutMs: 5000 });

    expect(mocks.create).toHaveBeenCalledWith(
      expect.objectContaining({
        model: "qwen2.5vl:7b",
        temperature: 0.1,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          {
            role: "user",
            content: [
              { type: "text", text: expect.stringContaining("Required columns, in this order: name, email") },
              { type: "image_url", image_url: { url: `data:image/png;base64,${PNG.toString("base64")}` } },
            ],
          },
        ],
      }),
      expect.anything()
    );
  });

  it("should give inference only the time left after the model check", async () => {
    vi.spyOn(Date, "now").mockReturnValueOnce(1000).mockReturnValueOnce(3000).mockReturnValue(4000);

    await callVisionModel(call, { host: HOST, timeoutMs: 5000 });

    expect(mocks.create).toHaveBeenCalledWith(expect.anything(), { timeout: 3000 });
  });

  it("should time out without inference when the model check used the whole budget", async () => {
    vi.spyOn(Date, "now").mockReturnValueOnce(1000).mockReturnValue(6000);

    const error = await captureError(callVisionModel(call, { host: HOST, timeoutMs: 5000 }));

    expect(error.code).toBe("TIMEOUT");
    expect(mocks.create).not.toHaveBeenCalled();
  });

  it("should return an empty string when the model sends no choices", async () => {
    mocks.create.mockResolvedValue({ choices: [] });

    await expect(callVisionModel(call, { host: HOST, timeoutMs: 5000 })).resolves.toBe("");
  });

  it("should fail with MODEL_UNAVAILABLE before inference when the model is not pulled", async () => {
    const error = await captureError(callVisionModel({ ...call, model: "minicpm-v" }, { host: HOST, timeoutMs: 5000 }));

    expect(error.code).toBe("MODEL_UNAVAILABLE");
    expect(error.details).toEqual({ host: HOST, model: "minicpm-v", available: ["qwen2.5vl:7b", "llava:latest"] });
    expect(mocks.create).not.toHaveBeenCalled();
  });

  it("should map a timeout to TIMEOUT", async () => {
    mocks.create.mockRejectedValue(new APIConnectionTimeoutError());

    const error = await captureError(callVisionModel(call, { host: HOST, timeoutMs: 5000 }));

    expect(error.code).toBe("TIMEOUT");
    expect(error.message).toBe("Vision model did not respond within 5000ms");
  });

  it("should map a connection failure to UNREACHABLE_ENDPOINT", async () => {
    mocks.list.mockRejectedValue(new APIConnectionError({ message: "Connection error." }));

    const error = await captureError(callVisionModel(call, { host: HOST, timeoutMs: 5000 }));

    expect(error.code).toBe("UNREACHABLE_ENDPOINT");
    expect(error.message).toBe("Cannot connect to Ollama at http://ollama.test:11434");
  });

  it("should map a 404 from inference to MODEL_UNAVAILABLE", async () => {
    mocks.create.mockRejectedValue(new NotFoundError(404, undefined, "model not found", undefined));

    const error = await captureError(callVisionModel(call, { host: HOST, timeoutMs: 5000 }));

    expect(error.code).toBe("MODEL_UNAVAILABLE");
  });

  it.each([
    { status: 400, error: new BadRequestError(400, undefined, "model does not support images", undefined) },
    { status: 401, error: new AuthenticationError(401, undefined, "unauthorized", undefined) },
  ])("should map a $status from inference to MODEL_REQUEST_REJECTED", async ({ error: rejection }) => {
    mocks.create.mockRejectedValue(rejection);

    const error = await captureError(callVisionModel(call, { host: HOST, timeoutMs: 5000 }));

    expect(error.code).toBe("MODEL_REQUEST_REJECTED");
    expect(isRetryableError(error.code)).toBe(false);
  });

  it.each([
    { status: 429, error: new RateLimitError(429, undefined, "busy", undefined) },
    { status: 500, error: new InternalServerError(500, undefined, "runner crashed", undefined) },
  ])("should map a $status from inference to a retryable UNREACHABLE_ENDPOINT", async ({ error: failure }) => {
    mocks.create.mockRejectedValue(failure);

    const error = await captureError(callVisionModel(call, { host: HOST, timeoutMs: 5000 }));

    expect(error.code).toBe("UNREACHABLE_ENDPOINT");
    expect(isRetryableError(error.code)).toBe(true);
  });

  it("should not retry a failed call", async () => {
    mocks.create.mockRejectedValue(new APIConnectionTimeoutError());

    await captureError(callVisionModel(call, { host: HOST, timeoutMs: 5000 }));

    expect(mocks.create).toHaveBeenCalledTimes(1);
  });
});

describe("modelMatches", () => {
  it("should treat a missing tag as :latest", () => {
    expect(modelMatches("llava", "llava:latest")).toBe(true);
    expect(modelMatches("llava:latest", "llava")).toBe(true);
  });

  it("should not match a different tag", () => {
    expect(modelMatches("llava:13b", "llava:latest")).toBe(false);
  });
});
