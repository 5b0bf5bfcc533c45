import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import lodash from "lodash";
import { parse } from "yaml";
import { z } from "zod";
import { TemplateStoreError, errorMessage } from "../errors.js";
import { SENSOR_KINDS, VALUE_TYPES } from "../models.js";
import type { SensorTemplate } from "../models.js";
import { DEFAULT_VALUE_TYPE } from "./coercion.js";

const { sortBy } = lodash;

// The bundled store sits at the package root, two levels above both src/disks and dist/disks.
const currentDir = dirname(fileURLToPath(import.meta.url));
export const DEFAULT_SENSORS_PATH = join(currentDir, "../../sensors.yml");

/**
 * Keys prefixed with "_" in a template entry. Anything else in the entry is
 * passed through to the discovery payload.
 */
const overridesSchema = z.object({
  key: z.string().min(1).optional(),
  type: z.enum(VALUE_TYPES).optional(),
});

const entrySchema = z.record(z.string(), z.unknown()).nullable();

const kindSchema = z.record(z.string(), entrySchema).nullable().optional();

const storeSchema = z.object({
  binary_sensor: kindSchema,
  sensor: kindSchema,
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

function splitEntry(
  entry: Record<string, unknown>,
): { overrides: Record<string, unknown>; extraPayload: Record<string, unknown> } {
  const overrides: Record<string, unknown> = {};
  const extraPayload: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    if (key.startsWith("_")) {
      overrides[key.replace(/^_+/, "").toLowerCase()] = value;
    } else {
      extraPayload[key] = value;
    }
  }
  return { overrides, extraPayload };
}

/**
 * Parse a YAML template store into tagged templates, ordered by kind and then
 * by template name.
 *
 * @example
 * ```yaml
 * sensor:
 *   temperature:
 *     _key: current_temperature
 *     _type: int
 *     unit_of_measurement: "°C"
 * ```
 */
export function parseSensorTemplates(source: string): SensorTemplate[] {
  let document: unknown;
  try {
    document = parse(source);
  } catch (e) {
    throw new TemplateStoreError(`Invalid YAML in sensor templates: ${errorMessage(e)}`, { cause: e });
  }

  const store = storeSchema.safeParse(document ?? {});
  if (!store.success) {
    throw new TemplateStoreError(`Invalid sensor templates: ${formatIssues(store.error)}`);
  }

  const templates: SensorTemplate[] = [];
  for (const kind of SENSOR_KINDS) {
    const entries = sortBy(Object.entries(store.data[kind] ?? {}), ([name]) => name);
    for (const [name, entry] of entries) {
      const { overrides, extraPayload } = splitEntry(entry ?? {});
      const parsed = overridesSchema.safeParse(overrides);
      if (!parsed.success) {
        throw new TemplateStoreError(
          `Invalid overrides for ${kind}.${name}: ${formatIssues(parsed.error)}`,
        );
      }
      templates.push({
        kind,
        name,
        queryKey: parsed.data.key ?? name,
        valueType: parsed.data.type ?? DEFAULT_VALUE_TYPE,
        extraPayload,
      });
    }
  }
  return templates;
}

export function loadSensorTemplates(path: string = DEFAULT_SENSORS_PATH): SensorTemplate[] {
  let source: string;
  try {
    source = readFileSync(path, "utf-8");
  } catch (e) {
    throw new TemplateStoreError(`Cannot read sensor templates from ${path}: ${errorMessage(e)}`, {
      cause: e,
    });
  }
  return parseSensorTemplates(source);
}
