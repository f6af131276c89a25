import { createHash } from "node:crypto";

export function contentHash(input: string | Buffer): string {
  return createHash("sha256").update(input).digest("hex");
}

/**
 * Hash over `(timestamp, bucket)` used to spot stale or replayed samples at
 * the agent boundary. Not a security primitive.
 */
export function sampleIntegrityHash(timestamp: number, bucketJoules: number): string {
  return contentHash(`${timestamp}:${bucketJoules}`);
}

export function decisionHash(timestamp: number, candidateId: string, delta: number): string {
  return contentHash(`${timestamp}:${candidateId}:${delta}`);
}

export function nowEpochSeconds(): number {
  return Date.now() / 1000;
}
