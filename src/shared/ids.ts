import { randomUUID } from "node:crypto";

export function shortId(prefix: string): string {
  return `${prefix}_${randomUUID().slice(0, 8)}`;
}

export function traceRef(): string {
  return `trace_${randomUUID()}`;
}
