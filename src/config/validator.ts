import Ajv2020Module from "ajv/dist/2020.js";
import addFormatsModule from "ajv-formats";
import type { HygieneConfig } from "../types/config.js";

const Ajv2020 = Ajv2020Module.default;
const addFormats = addFormatsModule.default;

export const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "remote", "stable_count", "automation_author", "label_prefix", "api_url", "page_size"],
  additionalProperties: false,
  properties: {
    schema_version: { type: "string", minLength: 1 },
    remote: { type: "string", minLength: 1 },
    stable_count: { type: "integer", minimum: 1 },
    automation_author: { type: "string", minLength: 1 },
    label_prefix: { type: "string", minLength: 1 },
    api_url: { type: "string", format: "uri" },
    page_size: { type: "integer", minimum: 1, maximum: 100 },
    repository: { type: "string", pattern: "^[A-Za-z0-9_.-]+/[A-Za-z0-9_.-]+$" },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: HygieneConfig }
  | { valid: false; errors: string };

const ajv = new Ajv2020({ allErrors: true, strict: true });
addFormats(ajv);
const validate = ajv.compile<HygieneConfig>(CONFIG_SCHEMA);

/** Validate a loaded config against the config schema. */
export function validateConfig(config: unknown): ConfigValidationResult {
  if (validate(config)) return { valid: true, config };
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}
