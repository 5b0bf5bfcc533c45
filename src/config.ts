import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigError } from "./errors.js";

type Env = Record<string, string | undefined>;

export const SNAPSHOT_SOURCE_KINDS = ["xml", "device"] as const;

export type SnapshotSourceKind = (typeof SNAPSHOT_SOURCE_KINDS)[number];

function stringEnvVar(env: Env, envVarName: string): string;
function stringEnvVar(env: Env, envVarName: string, defaultValue: string): string;
function stringEnvVar(env: Env, envVarName: string, defaultValue: null): string | undefined;
function stringEnvVar(
  env: Env,
  envVarName: string,
  defaultValue?: string | null,
): string | undefined {
  const raw = env[envVarName];
  const value = raw == null || raw === "" ? undefined : raw;
  if (value == null && defaultValue === undefined) {
    throw new ConfigError(`Missing env var ${envVarName}`);
  }
  return value ?? defaultValue ?? undefined;
}

function intEnvVar(env: Env, envVarName: string, defaultValue: number): number {
  const value = stringEnvVar(env, envVarName, null);
  if (value == null) {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`Env var ${envVarName} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function boolEnvVar(env: Env, envVarName: string, defaultValue = false): boolean {
  const value = stringEnvVar(env, envVarName, null);
  if (value == null) {
    return defaultValue;
  }
  return value === "1" || value.toLowerCase() === "true";
}

function enumEnvVar<T extends string>(
  env: Env,
  envVarName: string,
  allowed: readonly T[],
  defaultValue: T,
): T {
  const value = stringEnvVar(env, envVarName, null);
  if (value == null) {
    return defaultValue;
  }
  const match = allowed.find((candidate) => candidate === value.toLowerCase());
  if (match === undefined) {
    throw new ConfigError(`Env var ${envVarName} must be one of ${allowed.join(", ")}, got "${value}"`);
  }
  return match;
}

export function getConfig(env: Env = process.env) {
  const mqttUsername = stringEnvVar(env, "MQTT_USER", null);
  const mqttPassword = stringEnvVar(env, "MQTT_PASSWORD", null);
  // Credentials only count as a pair.
  const hasCredentials = mqttUsername != null && mqttPassword != null;
  return {
    mqttHost: stringEnvVar(env, "MQTT_HOST"),
    mqttPort: intEnvVar(env, "MQTT_PORT", 1883),
    mqttUsername: hasCredentials ? mqttUsername : undefined,
    mqttPassword: hasCredentials ? mqttPassword : undefined,
    mqttUseTls: boolEnvVar(env, "MQTT_USE_TLS"),
    mqttClientId: stringEnvVar(env, "MQTT_CLIENT_ID", "hdsentinel2mqtt"),
    mqttTopic: stringEnvVar(env, "MQTT_TOPIC", "hdsentinel"),
    discoveryPrefix: stringEnvVar(env, "MQTT_DISCOVERY_PREFIX", "homeassistant"),
    publishChunkSize: intEnvVar(env, "MQTT_PUBLISH_CHUNK_SIZE", 20),
    pollInterval: intEnvVar(env, "HDSENTINEL_INTERVAL", 600),
    source: enumEnvVar(env, "HDSENTINEL_SOURCE", SNAPSHOT_SOURCE_KINDS, "xml"),
    binaryPath: stringEnvVar(env, "HDSENTINEL_BINARY", "/usr/sbin/hdsentinel"),
    xmlPath: stringEnvVar(env, "HDSENTINEL_XML_PATH", null),
    reportPath: stringEnvVar(env, "HDSENTINEL_REPORT_PATH", join(tmpdir(), "hdsentinel_output.xml")),
    sensorsPath: stringEnvVar(env, "HDSENTINEL_SENSORS_PATH", null),
    debug: boolEnvVar(env, "DEBUG"),
  };
}

export type Config = ReturnType<typeof getConfig>;

export function anonymizeConfig(config: Config): Config {
  return {
    ...config,
    mqttPassword: config.mqttPassword != null ? "***" : undefined,
  };
}
