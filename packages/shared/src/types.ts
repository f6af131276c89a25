export type Device = "cpu" | "gpu";

/** Epoch seconds, fractional. */
export type EpochSeconds = number;

export interface PowerReadings {
  /** `null` when the device readout was unavailable for this tick. */
  cpuW: number | null;
  gpuW: number | null;
}

export interface EnergySample {
  timestamp: EpochSeconds;
  cpuPowerW: number;
  gpuPowerW: number;
  idleCpuW: number;
  idleGpuW: number;
  netPowerW: number;
  bucketJoules: number;
  integrityHash: string;
}

export interface TakeResult {
  ok: boolean;
  remainingJoules: number;
}

/** Wire shape of `GET /v1/sample`. */
export interface SampleResponse {
  ts: number;
  bucket_j: number;
  cpu_w: number;
  gpu_w: number;
  idle_cpu_w: number;
  idle_gpu_w: number;
  net_w: number;
  hash: string;
}

/** Wire shape of `POST /v1/take`. */
export interface TakeRequest {
  joules: number;
}

export interface TakeResponse {
  ok: boolean;
  remaining_j: number;
  error?: string;
}

export type TaskMetadata = Record<string, unknown>;

export interface TaskDescriptor {
  name: string;
  estimatedCostJoules: number;
}

export interface TaskResult {
  ok: boolean;
  delta: number;
  loss: number;
  contentHash: string;
  metadata: TaskMetadata;
}

export interface ReceiptInput {
  timestamp: EpochSeconds;
  taskName: string;
  joulesCharged: number;
  durationSec: number;
  delta: number;
  loss: number;
  contentHash: string;
  metadata: TaskMetadata;
}

export interface Receipt extends ReceiptInput {
  id: number;
}

export interface MergeDecision {
  accepted: boolean;
  delta: number;
  secondaryGain: number | null;
  decisionHash: string;
  candidateId: string;
  timestamp: EpochSeconds;
}

export function computeNetPower(
  cpuW: number,
  idleCpuW: number,
  gpuW: number,
  idleGpuW: number
): number {
  return Math.max(0, cpuW - idleCpuW) + Math.max(0, gpuW - idleGpuW);
}

export function toSampleResponse(sample: EnergySample): SampleResponse {
  return {
    ts: sample.timestamp,
    bucket_j: sample.bucketJoules,
    cpu_w: sample.cpuPowerW,
    gpu_w: sample.gpuPowerW,
    idle_cpu_w: sample.idleCpuW,
    idle_gpu_w: sample.idleGpuW,
    net_w: sample.netPowerW,
    hash: sample.integrityHash
  };
}

export function fromSampleResponse(body: SampleResponse): EnergySample {
  return {
    timestamp: body.ts,
    cpuPowerW: body.cpu_w,
    gpuPowerW: body.gpu_w,
    idleCpuW: body.idle_cpu_w,
    idleGpuW: body.idle_gpu_w,
    netPowerW: body.net_w,
    bucketJoules: body.bucket_j,
    integrityHash: body.hash
  };
}
