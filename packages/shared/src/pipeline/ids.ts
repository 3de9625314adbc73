import { randomUUID } from "node:crypto";
import type { CorrelationId } from "./types.js";

export const MAX_CORRELATION_ID_CHARS = 128;

const CORRELATION_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

export function isCorrelationId(value: string): value is CorrelationId {
  return value.length > 0 && value.length <= MAX_CORRELATION_ID_CHARS && CORRELATION_ID_PATTERN.test(value);
}

export function asCorrelationId(value: string): CorrelationId {
  const trimmed = value.trim();
  if (!isCorrelationId(trimmed)) {
    throw new TypeError(`Invalid correlation id: ${JSON.stringify(value.slice(0, MAX_CORRELATION_ID_CHARS))}`);
  }
  return trimmed;
}

/**
 * Reads a caller-supplied correlation id (a header value, possibly repeated).
 * Returns null when nothing usable was sent so the caller can mint one.
 */
export function parseCorrelationId(value: unknown): CorrelationId | null {
  const candidate = Array.isArray(value) ? value[0] : value;
  if (typeof candidate !== "string") {
    return null;
  }
  const trimmed = candidate.trim();
  return isCorrelationId(trimmed) ? trimmed : null;
}

export function newCorrelationId(): CorrelationId {
  return asCorrelationId(randomUUID());
}
