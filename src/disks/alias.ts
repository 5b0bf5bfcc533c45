/**
 * Split a model string on case boundaries, hyphens and whitespace and join the
 * lowercased words with underscores.
 *
 * @example
 * toSnakeCase("WDC WD10EZEX-00WN4A0"); // "wdc_wd10_ezex_00_wn4_a0"
 */
export function toSnakeCase(name: string): string {
  return name
    .replace(/-/g, " ")
    .replace(/([A-Z]+)/g, " $1")
    .replace(/([A-Z][a-z]+)/g, " $1")
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .join("_")
    .toLowerCase();
}

/**
 * Collapse every run of characters outside [a-zA-Z0-9] into a single
 * underscore, trim underscores from both ends and lowercase.
 */
export function toSafeId(value: string | null | undefined): string {
  return (value ?? "")
    .replace(/[^a-zA-Z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .toLowerCase();
}

/**
 * Derive the alias a disk is published under. Disks sharing a model name get
 * distinct aliases because the normalized serial number is appended.
 */
export function buildDiskAlias(
  modelId: string | null | undefined,
  serialNumber: string | null | undefined,
): string {
  const modelPart = toSnakeCase(modelId?.trim() ? modelId : "unknown");
  const serialPart = toSafeId(serialNumber) || "unknown";
  return `${modelPart}_${serialPart}`;
}
