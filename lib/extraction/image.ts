/**
 * Decoding of uploaded spreadsheet photos.
 *
 * Browsers send the image as a data URL ("data:image/jpeg;base64,...");
 * API clients often send bare base64. Both end up as a Buffer plus the MIME
 * type sniffed from its leading bytes.
 */

import { EXTRACTION_ERROR_CODES, ExtractionError } from "./errors";

const MAX_IMAGE_BYTES = 20 * 1024 * 1024; // 20MB

const DATA_URL_PATTERN = /^data:([^;,]*)(;base64)?,/i;

/**
 * Identify the image format from its magic bytes.
 * Returns null for anything that is not PNG, JPEG, GIF or WebP.
 */
export function sniffImageMimeType(buffer: Buffer): string | null {
  if (buffer.length >= 8 && buffer.subarray(0, 8).equals(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]))) {
    return "image/png";
  }
  if (buffer.length >= 3 && buffer[0] === 0xff && buffer[1] === 0xd8 && buffer[2] === 0xff) {
    return "image/jpeg";
  }
  if (buffer.length >= 6) {
    const sig = buffer.subarray(0, 6).toString("ascii");
    if (sig === "GIF87a" || sig === "GIF89a") return "image/gif";
  }
  if (
    buffer.length >= 12 &&
    buffer.subarray(0, 4).toString("ascii") === "RIFF" &&
    buffer.subarray(8, 12).toString("ascii") === "WEBP"
  ) {
    return "image/webp";
  }
  return null;
}

/**
 * Decode a base64 string or data URL into image bytes.
 *
 * @throws ExtractionError INVALID_REQUEST when the payload is empty, too
 * large, not base64, or not a supported image format
 */
export function decodeImageInput(input: string): { buffer: Buffer; mimeType: string } {
  let payload = input.trim();
  const match = payload.match(DATA_URL_PATTERN);
  if (match) {
    if (!match[2]) {
      throw new ExtractionError(EXTRACTION_ERROR_CODES.INVALID_REQUEST, "Image data URL must be base64-encoded");
    }
    payload = payload.slice(match[0].length);
  }

  payload = payload.replace(/\s+/g, "");
  if (!payload) {
    throw new ExtractionError(EXTRACTION_ERROR_CODES.INVALID_REQUEST, "Image is empty");
  }
  if (!/^[A-Za-z0-9+/_-]+={0,2}$/.test(payload)) {
    throw new ExtractionError(EXTRACTION_ERROR_CODES.INVALID_REQUEST, "Image is not valid base64");
  }

  const buffer = Buffer.from(payload, "base64");
  if (buffer.length > MAX_IMAGE_BYTES) {
    throw new ExtractionError(
      EXTRACTION_ERROR_CODES.INVALID_REQUEST,
      `Image is too large (${buffer.length} bytes, max ${MAX_IMAGE_BYTES})`
    );
  }

  const mimeType = sniffImageMimeType(buffer);
  if (!mimeType) {
    throw new ExtractionError(
      EXTRACTION_ERROR_CODES.INVALID_REQUEST,
      "Unsupported image format (expected PNG, JPEG, GIF or WebP)"
    );
  }

  return { buffer, mimeType };
}

export function toDataUrl(buffer: Buffer, mimeType: string): string {
  return `data:${mimeType};base64,${buffer.toString("base64")}`;
}
