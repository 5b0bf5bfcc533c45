import lodash from "lodash";
import stringify from "json-stable-stringify-without-jsonify";
import { SENSOR_KINDS } from "../models.js";
import type {
  DiskIdentity,
  OutgoingMessage,
  SensorDescriptor,
  SensorTemplate,
  ValueType,
} from "../models.js";
import { buildDiskAlias } from "./alias.js";

const { cloneDeep, sortBy } = lodash;

export const DEVICE_PREFIX = "hdsentinel";

export const DEFAULT_DISCOVERY_PREFIX = "homeassistant";

const MANUFACTURER = "hdsentinel";

const STATE_TOPIC_SUFFIX = "hdsentinel";

const AVAILABILITY_TOPIC_SUFFIX = "availability";

const ORIGIN = {
  name: "hdsentinel2mqtt",
  sw_version: "1.0.0",
};

export interface ExpandOptions {
  /**
   * Poll interval in seconds.
   */
  pollInterval: number;
  baseTopic: string;
  discoveryPrefix?: string;
}

/**
 * Everything needed to publish one disk: its discovery descriptors, the topics
 * its state and availability go to, and the value type of every sensor key.
 */
export interface DiskSensorConfig {
  alias: string;
  stateTopic: string;
  availabilityTopic: string;
  sensors: SensorDescriptor[];
  valueTypes: Record<string, ValueType>;
}

export function diskTopics(
  baseTopic: string,
  alias: string,
): { stateTopic: string; availabilityTopic: string } {
  return {
    stateTopic: `${baseTopic}/${alias}/${STATE_TOPIC_SUFFIX}`,
    availabilityTopic: `${baseTopic}/${alias}/${AVAILABILITY_TOPIC_SUFFIX}`,
  };
}

/**
 * Seconds after which Home Assistant marks a sensor unavailable: one and a half
 * poll intervals, so a single late poll does not flap the entity.
 */
export function expireAfter(pollInterval: number): number {
  return Math.ceil(1.5 * pollInterval);
}

/**
 * Expand every template against one disk. Templates are visited by kind and
 * then by name regardless of the order they are passed in.
 */
export function expandSensorTemplates(
  identity: DiskIdentity,
  templates: readonly SensorTemplate[],
  options: ExpandOptions,
): DiskSensorConfig {
  const alias = buildDiskAlias(identity.modelId, identity.serialNumber);
  const { stateTopic, availabilityTopic } = diskTopics(options.baseTopic, alias);
  const discoveryPrefix = options.discoveryPrefix ?? DEFAULT_DISCOVERY_PREFIX;
  const deviceId = `${DEVICE_PREFIX}_${identity.serialNumber}`;

  const ordered = sortBy(templates, [
    (template) => SENSOR_KINDS.indexOf(template.kind),
    (template) => template.name,
  ]);

  const valueTypes: Record<string, ValueType> = {};
  const sensors = ordered.map((template): SensorDescriptor => {
    valueTypes[template.queryKey] = template.valueType;
    return {
      topic: `${discoveryPrefix}/${template.kind}/${DEVICE_PREFIX}_${alias}/${template.queryKey}/config`,
      payload: {
        device: {
          identifiers: [deviceId],
          manufacturer: MANUFACTURER,
          name: alias,
          model: identity.modelId,
          sw_version: identity.firmwareRevision,
        },
        origin: { ...ORIGIN },
        expire_after: expireAfter(options.pollInterval),
        unique_id: `${deviceId}_${template.queryKey}`,
        name: `${alias}_${template.name}`,
        availability_topic: availabilityTopic,
        state_topic: stateTopic,
        json_attributes_topic: stateTopic,
        value_template: `{{value_json.${template.queryKey}}}`,
        ...cloneDeep(template.extraPayload),
      },
    };
  });

  return { alias, stateTopic, availabilityTopic, sensors, valueTypes };
}

/**
 * Retained discovery messages for a disk, serialised with sorted keys so the
 * same configuration always produces the same bytes.
 */
export function discoveryMessages(config: DiskSensorConfig): OutgoingMessage[] {
  return config.sensors.map((sensor) => ({
    topic: sensor.topic,
    payload: stringify(sensor.payload),
    retain: true,
  }));
}
