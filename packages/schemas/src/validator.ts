import Ajv, { type ErrorObject } from "ajv";
import { ClientConfigSchema, AutoPlayOptionsSchema } from "./config.schema.js";
import { ValidationError } from "./errors.js";
import type { ClientConfig } from "./types.js";

const ajv = new (Ajv.default ?? Ajv)({ allErrors: true, strict: false });

const validateClientConfig = ajv.compile<ClientConfig>(ClientConfigSchema);
const validateAutoPlayOptions = ajv.compile(AutoPlayOptionsSchema);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

export function validateClientConfigData(data: unknown): ValidationResult {
  const valid = validateClientConfig(data);
  return toResult(valid, validateClientConfig.errors);
}

export function validateAutoPlayOptionsData(data: unknown): ValidationResult {
  const valid = validateAutoPlayOptions(data);
  return toResult(valid, validateAutoPlayOptions.errors);
}

/** Validates a merged configuration object and returns it typed, or throws. */
export function parseClientConfig(data: unknown): ClientConfig {
  if (validateClientConfig(data)) return data;
  throw new ValidationError("configuration", toResult(false, validateClientConfig.errors).errors);
}
