import Ajv, { type JSONSchemaType } from "ajv";
import type { SampleResponse, TakeResponse } from "@joulegate/shared";

const sampleResponseSchema: JSONSchemaType<SampleResponse> = {
  type: "object",
  required: ["ts", "bucket_j", "cpu_w", "gpu_w", "idle_cpu_w", "idle_gpu_w", "net_w", "hash"],
  properties: {
    ts: { type: "number" },
    bucket_j: { type: "number", minimum: 0 },
    cpu_w: { type: "number" },
    gpu_w: { type: "number" },
    idle_cpu_w: { type: "number" },
    idle_gpu_w: { type: "number" },
    net_w: { type: "number", minimum: 0 },
    hash: { type: "string", minLength: 1 }
  }
};

const takeResponseSchema: JSONSchemaType<TakeResponse> = {
  type: "object",
  required: ["ok", "remaining_j"],
  properties: {
    ok: { type: "boolean" },
    remaining_j: { type: "number" },
    error: { type: "string", nullable: true }
  }
};

const ajv = new Ajv({ allErrors: true });

export const isSampleResponse = ajv.compile(sampleResponseSchema);
export const isTakeResponse = ajv.compile(takeResponseSchema);
