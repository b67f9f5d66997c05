import { gunzipSync, gzipSync } from "node:zlib";

export function avg(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

export function gzipString(str: string): Uint8Array {
  return gzipSync(new TextEncoder().encode(str));
}

export function gunzipString(data: Uint8Array): string {
  return new TextDecoder().decode(gunzipSync(data));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function getMemUsed(): number {
  return process.memoryUsage().heapUsed;
}

/**
 * Milliseconds elapsed since startTime (from process.hrtime.bigint()).
 */
export function msSince(startTime: bigint): number {
  return Math.round(
    new Number(process.hrtime.bigint() - startTime).valueOf() / 1000000
  );
}
