import { env } from "node:process";
import pino from "pino";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Shared Pino logger.
 *
 * Reads LOG_LEVEL directly rather than through the config module, which
 * would otherwise be parsed at import time.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type TelemetryLeaf = string | number | boolean | null;
export type TelemetryValue = TelemetryLeaf | TelemetryValue[] | { [key: string]: TelemetryValue };
export type TelemetryShape = { [key: string]: TelemetryValue };
export type Event = Record<string, unknown>;

/**
 * Test sink for capturing telemetry events in tests.
 * Only used when NODE_ENV=test or VITEST=true
 */
let testSink: ((eventName: string, data: TelemetryShape) => void) | null = null;

export function setTestSink(sink: ((eventName: string, data: TelemetryShape) => void) | null): void {
  const isTestEnv = env.NODE_ENV === "test" || env.VITEST === "true" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 */
export const TelemetryEvents = {
  ConvertSucceeded: "dep2con.convert.succeeded",
  ConvertFailed: "dep2con.convert.failed",
  BatchCompleted: "dep2con.batch.completed",
  ClassifierFitted: "dep2con.classifier.fitted",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

function sanitizeTelemetryValue(value: unknown): TelemetryValue | undefined {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }

  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }

  if (Array.isArray(value)) {
    const sanitizedArray: TelemetryValue[] = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      if (sanitizedItem !== undefined) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (typeof value === "object") {
    return sanitizeTelemetryData(Object.fromEntries(Object.entries(value)));
  }

  // functions, symbols, bigint, undefined
  return undefined;
}

function sanitizeTelemetryData(data: Event): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

/**
 * Emit a structured telemetry event.
 */
export function emit(event: TelemetryEventName, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }

  log.info({ event, ...eventData });
}
