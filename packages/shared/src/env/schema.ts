export type EnvSchema = {
  required: string[];
  optional?: string[];
  allowEmpty?: string[];
};

export type EnvService = "agent" | "orchestrator";

export type EnvValueType = "number" | "nullable-number" | "string" | "log-level";

export interface EnvOverride {
  key: string;
  path: string[];
  type: EnvValueType;
}

/**
 * Environment variables that override values from the config file.
 */
export const ENV_OVERRIDES: EnvOverride[] = [
  { key: "JOULE_CPU_TDP_W", path: ["energy", "cpuTdpW"], type: "number" },
  { key: "JOULE_SMOOTHING", path: ["energy", "smoothingAlpha"], type: "number" },
  { key: "JOULE_HZ", path: ["energy", "sampleHz"], type: "number" },
  { key: "JOULE_IDLE_LEARN_W", path: ["energy", "idleLearnW"], type: "nullable-number" },
  { key: "JOULE_AGENT_HOST", path: ["agent", "host"], type: "string" },
  { key: "JOULE_AGENT_PORT", path: ["agent", "port"], type: "number" },
  { key: "JOULE_AGENT_URL", path: ["scheduler", "agentUrl"], type: "string" },
  { key: "JOULE_DELTA_THRESHOLD", path: ["merge", "deltaThreshold"], type: "number" },
  { key: "JOULE_SECONDARY_THRESHOLD", path: ["merge", "secondaryThreshold"], type: "number" },
  { key: "JOULEGATE_LOG_LEVEL", path: ["logging", "level"], type: "log-level" }
];

export const ENV_SCHEMAS: Record<EnvService, EnvSchema> = {
  agent: {
    required: [],
    optional: [
      "JOULEGATE_CONFIG",
      "JOULEGATE_LOG_LEVEL",
      "JOULE_CPU_TDP_W",
      "JOULE_SMOOTHING",
      "JOULE_HZ",
      "JOULE_IDLE_LEARN_W",
      "JOULE_AGENT_HOST",
      "JOULE_AGENT_PORT"
    ],
    allowEmpty: ["JOULE_IDLE_LEARN_W"]
  },
  orchestrator: {
    required: [],
    optional: [
      "JOULEGATE_CONFIG",
      "JOULE_AGENT_URL",
      "JOULEGATE_LOG_LEVEL",
      "JOULE_DELTA_THRESHOLD",
      "JOULE_SECONDARY_THRESHOLD"
    ]
  }
};
