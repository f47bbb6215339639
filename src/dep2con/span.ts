import type { CharSpan, EduSpan } from "./types.js";

export function spansOverlap(a: CharSpan, b: CharSpan): boolean {
  return Math.max(a.start, b.start) < Math.min(a.end, b.end);
}

/**
 * Smallest span covering both.
 */
export function mergeSpans(a: CharSpan, b: CharSpan): CharSpan {
  return { start: Math.min(a.start, b.start), end: Math.max(a.end, b.end) };
}

/**
 * Order spans by start, then end.
 */
export function compareSpans(a: CharSpan, b: CharSpan): number {
  return a.start - b.start || a.end - b.end;
}

export function spansEqual(a: CharSpan, b: CharSpan): boolean {
  return a.start === b.start && a.end === b.end;
}

export function mergeEduSpans(a: EduSpan, b: EduSpan): EduSpan {
  return [Math.min(a[0], b[0]), Math.max(a[1], b[1])];
}

export function formatSpan(span: CharSpan): string {
  return `[${span.start}, ${span.end})`;
}
