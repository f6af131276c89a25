import fs from "fs";
import path from "path";
import Ajv2020 from "ajv/dist/2020";
import type { ValidateFunction } from "ajv";
import { resolveEnvOverrides, type EnvSource } from "../env/validator";
import { DEFAULT_CONFIG } from "./defaults";
import type { JouleGateConfig, ValidationResult } from "./types";

export const defaultSchemaPath = path.resolve(__dirname, "../../../../config/schema/joulegate.schema.json");

export class ConfigValidationError extends Error {
  constructor(public readonly errors: string[], source?: string) {
    super(`Config validation failed${source ? ` for ${source}` : ""}:\n${errors.join("\n")}`);
    this.name = "ConfigValidationError";
  }
}

export interface LoadConfigOptions {
  /** JSON file layered over the defaults. */
  filePath?: string;
  env?: EnvSource;
  schemaPath?: string;
}

const validators = new Map<string, ValidateFunction<JouleGateConfig>>();

function getValidator(schemaFilePath: string): ValidateFunction<JouleGateConfig> {
  const cached = validators.get(schemaFilePath);
  if (cached) {
    return cached;
  }
  const schema = JSON.parse(fs.readFileSync(schemaFilePath, "utf-8"));
  const ajv = new Ajv2020({ allErrors: true, strict: false });
  const validateFn = ajv.compile<JouleGateConfig>(schema);
  validators.set(schemaFilePath, validateFn);
  return validateFn;
}

function formatErrors(validateFn: ValidateFunction<JouleGateConfig>): string[] {
  return validateFn.errors?.map(err => `${err.instancePath || "/"} ${err.message ?? "is invalid"}`) ?? [];
}

/**
 * Validates config and returns structured result without throwing.
 */
export function validateConfig(config: unknown, schemaFilePath: string = defaultSchemaPath): ValidationResult {
  const validateFn = getValidator(schemaFilePath);
  if (!validateFn(config)) {
    return { valid: false, errors: formatErrors(validateFn) };
  }
  return { valid: true };
}

export function parseConfig(config: unknown, schemaFilePath: string = defaultSchemaPath, source?: string): JouleGateConfig {
  const validateFn = getValidator(schemaFilePath);
  if (!validateFn(config)) {
    throw new ConfigValidationError(formatErrors(validateFn), source);
  }
  return config;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge where plain objects merge key by key and anything else,
 * arrays included, replaces the base value. `undefined` keeps the base.
 */
export function mergeConfig(base: unknown, override: unknown): unknown {
  if (override === undefined) {
    return base;
  }
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override;
  }
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = mergeConfig(base[key], value);
  }
  return merged;
}

function nest(pathParts: string[], value: unknown): unknown {
  return pathParts.reduceRight<unknown>((inner, key) => ({ [key]: inner }), value);
}

export function applyEnvOverrides(config: unknown, env: EnvSource = process.env): unknown {
  return resolveEnvOverrides(env).reduce<unknown>(
    (current, override) => mergeConfig(current, nest(override.path, override.value)),
    config
  );
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Defaults, then the optional file, then env overrides; validated and frozen.
 */
export function loadConfig(options: LoadConfigOptions = {}): JouleGateConfig {
  const schemaPath = options.schemaPath ?? defaultSchemaPath;
  let layered: unknown = structuredClone(DEFAULT_CONFIG);
  if (options.filePath) {
    const raw = fs.readFileSync(options.filePath, "utf-8");
    layered = mergeConfig(layered, JSON.parse(raw));
  }
  layered = applyEnvOverrides(layered, options.env ?? process.env);
  return deepFreeze(parseConfig(layered, schemaPath, options.filePath));
}
