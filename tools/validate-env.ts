import { readFileSync } from "node:fs";
import path from "node:path";
import { parse } from "dotenv";
import { ENV_SCHEMAS, type EnvService } from "../packages/shared/src/env/schema";
import {
  getInvalidEnvVars,
  getMissingEnvVars,
  getUnknownEnvVars
} from "../packages/shared/src/env/validator";

type TemplateConfig = {
  description: string;
  path: string;
};

const TEMPLATE_MAP: Record<EnvService, TemplateConfig> = {
  agent: { description: "power agent env", path: "env/.env.agent" },
  orchestrator: { description: "orchestrator env", path: "env/.env.orchestrator" }
};

const SERVICES: EnvService[] = ["agent", "orchestrator"];

function readTemplate(service: EnvService): Record<string, string> {
  const absolutePath = path.resolve(process.cwd(), TEMPLATE_MAP[service].path);
  const contents = readFileSync(absolutePath, "utf8");
  return parse(contents);
}

function main() {
  const failures: string[] = [];

  SERVICES.forEach(service => {
    const templateValues = readTemplate(service);
    const missing = getMissingEnvVars(service, templateValues);
    if (missing.length) {
      failures.push(`${service}: missing ${missing.join(", ")}`);
    }
    const unknown = getUnknownEnvVars(service, templateValues);
    if (unknown.length) {
      failures.push(`${service}: undeclared ${unknown.join(", ")}`);
    }
    const invalid = getInvalidEnvVars(templateValues);
    if (invalid.length) {
      failures.push(`${service}: invalid ${invalid.join(", ")}`);
    }
  });

  if (failures.length) {
    console.error("Environment template validation failed:\n");
    failures.forEach(failure => console.error(` • ${failure}`));
    process.exitCode = 1;
    return;
  }

  console.log("All environment templates satisfy the schema:", Object.keys(ENV_SCHEMAS).join(", "));
}

main();
