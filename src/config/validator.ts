import { loadAjv } from "../schema/ajv.js";
import { LANE_COLORS, type LanegateConfig } from "../types/config.js";

const COMMAND_SCHEMA = { type: "array", items: { type: "string", minLength: 1 }, minItems: 1 };

const CHECK_SCHEMA = {
  type: "object",
  required: ["name", "command"],
  properties: {
    name: { type: "string", minLength: 1 },
    command: COMMAND_SCHEMA,
    when: {
      type: "object",
      minProperties: 1,
      properties: {
        tool: { type: "string", minLength: 1 },
        file: { type: "string", minLength: 1 },
      },
      additionalProperties: false,
    },
  },
};

const LANE_PROPERTIES = {
  name: { type: "string", minLength: 1 },
  color: { type: "string", enum: [...LANE_COLORS] },
  checks: { type: "array", items: CHECK_SCHEMA },
};

const VERSION_SOURCE_SCHEMA = {
  type: "object",
  required: ["file", "pattern"],
  properties: {
    file: { type: "string", minLength: 1 },
    pattern: { type: "string", minLength: 1 },
  },
};

const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "title", "timeout_seconds", "format", "versions", "lanes"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    title: { type: "string", minLength: 1 },
    root: { type: "string", minLength: 1 },
    timeout_seconds: { type: "integer", minimum: 1 },
    format: {
      type: "object",
      required: ["check", "fix"],
      properties: { check: COMMAND_SCHEMA, fix: COMMAND_SCHEMA },
    },
    versions: {
      type: "object",
      required: ["primary", "secondary"],
      properties: { primary: VERSION_SOURCE_SCHEMA, secondary: VERSION_SOURCE_SCHEMA },
    },
    lanes: {
      type: "array",
      items: { type: "object", required: ["name", "color", "checks"], properties: LANE_PROPERTIES },
    },
    consistency: {
      type: "object",
      required: ["name", "color", "parity"],
      properties: {
        name: LANE_PROPERTIES.name,
        color: LANE_PROPERTIES.color,
        parity: {
          type: "object",
          required: ["source", "artifact", "compile"],
          properties: {
            source: { type: "string", minLength: 1 },
            artifact: { type: "string", minLength: 1 },
            compile: COMMAND_SCHEMA,
          },
        },
      },
    },
    bench: {
      type: "object",
      required: ["name", "color", "checks", "results_dir", "results_glob", "history_file"],
      properties: {
        ...LANE_PROPERTIES,
        results_dir: { type: "string", minLength: 1 },
        results_glob: { type: "string", minLength: 1 },
        history_file: { type: "string", minLength: 1 },
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: LanegateConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a loaded config against the config schema. */
export async function validateConfig(raw: unknown): Promise<ConfigValidationResult> {
  const ajv = await loadAjv();
  const validate = ajv.compile<LanegateConfig>(CONFIG_SCHEMA);
  if (validate(raw)) {
    const patternError = checkPatterns(raw);
    if (patternError) return { valid: false, errors: patternError };
    return { valid: true, config: raw, errors: null };
  }
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}

/** Version patterns are compiled at run time; reject ones that cannot be. */
function checkPatterns(config: LanegateConfig): string | null {
  for (const [key, source] of Object.entries(config.versions)) {
    try {
      new RegExp(source.pattern);
    } catch (e: unknown) {
      const message = e instanceof Error ? e.message : String(e);
      return `data/versions/${key}/pattern is not a valid regular expression: ${message}`;
    }
  }
  return null;
}
