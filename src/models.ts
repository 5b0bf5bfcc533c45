/**
 * Raw attributes of a single disk as reported by the diagnostic utility.
 * Attribute names keep the utility's casing, e.g. "Hard_Disk_Model_ID".
 */
export type DiskAttributes = Record<string, string>;

/**
 * One poll of the diagnostic utility, keyed by disk serial number.
 */
export type DiskSnapshot = Map<string, DiskAttributes>;

export interface DiskIdentity {
  serialNumber: string;
  modelId: string;
  firmwareRevision: string;
}

export const SENSOR_KINDS = ["binary_sensor", "sensor"] as const;

export type SensorKind = (typeof SENSOR_KINDS)[number];

export const VALUE_TYPES = ["int", "float", "str"] as const;

export type ValueType = (typeof VALUE_TYPES)[number];

export type CoercedValue = string | number;

export interface SensorTemplate {
  kind: SensorKind;
  name: string;
  /**
   * Lowercased attribute name the sensor reads from the state payload.
   */
  queryKey: string;
  valueType: ValueType;
  /**
   * Free-form discovery fields merged over the generated payload.
   */
  extraPayload: Record<string, unknown>;
}

export interface SensorDescriptor {
  topic: string;
  payload: Record<string, unknown>;
}

export interface OutgoingMessage {
  topic: string;
  payload: string;
  retain?: boolean;
}

export type Availability = "online" | "offline";

/**
 * Attribute names of the diagnostic utility's disk summary that identify a disk.
 */
export const MODEL_ID_ATTRIBUTE = "Hard_Disk_Model_ID";
export const SERIAL_NUMBER_ATTRIBUTE = "Hard_Disk_Serial_Number";
export const FIRMWARE_REVISION_ATTRIBUTE = "Firmware_Revision";
export const DEVICE_ATTRIBUTE = "Hard_Disk_Device";
