import { isLogLevel } from "../observability";
import type { EnvOverride, EnvService } from "./schema";
import { ENV_OVERRIDES, ENV_SCHEMAS } from "./schema";

export type EnvSource = Record<string, string | undefined>;

const PLACEHOLDER_PATTERNS = [/CHANGE_ME/i, /REPLACE_ME/i, /^<.*>$/];
const NULL_TOKENS = ["", "none", "null", "off"];

export class EnvValidationError extends Error {
  constructor(
    scope: string,
    public readonly missing: string[],
    public readonly invalid: string[] = []
  ) {
    const parts: string[] = [];
    if (missing.length) {
      parts.push(`missing ${[...missing].sort().join(", ")}`);
    }
    if (invalid.length) {
      parts.push(`invalid ${[...invalid].sort().join(", ")}`);
    }
    super(`[env] Environment check failed for ${scope}: ${parts.join("; ")}`);
    this.name = "EnvValidationError";
  }
}

export interface ResolvedEnvOverride {
  key: string;
  path: string[];
  value: string | number | null;
}

export function getMissingEnvVars(service: EnvService, source: EnvSource = process.env): string[] {
  const schema = ENV_SCHEMAS[service];
  if (!schema) {
    return [];
  }

  return schema.required.filter(key => {
    const value = source[key];
    if (value === undefined || value === null) {
      return true;
    }

    if (schema.allowEmpty?.includes(key)) {
      return false;
    }

    const trimmed = value.trim();
    if (!trimmed.length) {
      return true;
    }

    return PLACEHOLDER_PATTERNS.some(pattern => pattern.test(trimmed));
  });
}

export function assertEnvVars(service: EnvService, source: EnvSource = process.env): void {
  const missing = getMissingEnvVars(service, source);
  const invalid = getInvalidEnvVars(source);
  if (missing.length || invalid.length) {
    throw new EnvValidationError(service, missing, invalid);
  }
}

/**
 * Keys in `source` that the service schema does not declare. Only meaningful
 * for env templates; the process environment carries unrelated variables.
 */
export function getUnknownEnvVars(service: EnvService, source: EnvSource): string[] {
  const schema = ENV_SCHEMAS[service];
  const known = new Set([...schema.required, ...(schema.optional ?? [])]);
  return Object.keys(source).filter(key => !known.has(key));
}

/**
 * Names of override variables that are set but cannot be parsed.
 */
export function getInvalidEnvVars(source: EnvSource = process.env): string[] {
  return ENV_OVERRIDES.filter(override => {
    const raw = source[override.key];
    return raw !== undefined && parseOverride(override, raw) === undefined;
  }).map(override => override.key);
}

export function resolveEnvOverrides(source: EnvSource = process.env): ResolvedEnvOverride[] {
  const invalid = getInvalidEnvVars(source);
  if (invalid.length) {
    throw new EnvValidationError("config overrides", [], invalid);
  }
  const resolved: ResolvedEnvOverride[] = [];
  for (const override of ENV_OVERRIDES) {
    const raw = source[override.key];
    if (raw === undefined) {
      continue;
    }
    const value = parseOverride(override, raw);
    if (value !== undefined) {
      resolved.push({ key: override.key, path: override.path, value });
    }
  }
  return resolved;
}

/** `undefined` marks an unparseable value. */
function parseOverride(override: EnvOverride, raw: string): string | number | null | undefined {
  const trimmed = raw.trim();
  switch (override.type) {
    case "string":
      return trimmed.length ? trimmed : undefined;
    case "log-level": {
      const normalized = trimmed.toLowerCase();
      return isLogLevel(normalized) ? normalized : undefined;
    }
    case "nullable-number":
      if (NULL_TOKENS.includes(trimmed.toLowerCase())) {
        return null;
      }
      return parseFiniteNumber(trimmed);
    case "number":
      return parseFiniteNumber(trimmed);
  }
}

function parseFiniteNumber(raw: string): number | undefined {
  if (!raw.length) {
    return undefined;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}
