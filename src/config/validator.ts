import Ajv2020 from "ajv/dist/2020.js";
import type { VcspinConfig } from "../types/config.js";

type ConfigValidateFn = ((data: unknown) => data is VcspinConfig) & { errors?: unknown };

type AjvLike = {
  compile: (schema: unknown) => ConfigValidateFn;
  errorsText: (errors: unknown) => string;
};

/** Every key is required once the layers are merged; base.yaml supplies defaults. */
export const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "manifest", "pin_variable", "source_variable", "shell", "pin_mode", "log_level"],
  additionalProperties: false,
  properties: {
    schema_version: { type: "string", minLength: 1 },
    manifest: { type: "string", minLength: 1 },
    pin_variable: { type: "string", pattern: "^[A-Za-z_][A-Za-z0-9_]*$" },
    source_variable: { type: "string", pattern: "^[A-Za-z_][A-Za-z0-9_]*$" },
    shell: { type: "string", minLength: 1 },
    pin_mode: { type: "string", enum: ["tag", "commit"] },
    log_level: { type: "string", enum: ["error", "warn", "info", "debug", "trace"] },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: VcspinConfig; errors: null }
  | { valid: false; errors: string };

let ajv: AjvLike | undefined;
let validateFn: ConfigValidateFn | undefined;

function compiled(): { ajv: AjvLike; validate: ConfigValidateFn } {
  if (!ajv || !validateFn) {
    // ajv ships CommonJS; under NodeNext its default export types as the module object.
    const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvLike };
    ajv = new AjvCtor({ allErrors: true, strict: true });
    validateFn = ajv.compile(CONFIG_SCHEMA);
  }
  return { ajv, validate: validateFn };
}

/** Validate merged config layers against the config schema. */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { ajv, validate } = compiled();
  if (validate(config)) return { valid: true, config, errors: null };
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}
