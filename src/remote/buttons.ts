import type { DeviceType } from "../govee/schema.ts";
import type { ButtonMapping } from "../host/types.ts";
import type { DeviceRecord, DeviceRegistry } from "../registry/schema.ts";
import { cleanCommandName } from "./naming.ts";

const PRIMARY_TYPES: DeviceType[] = [
  "sync_box",
  "light",
  "kettle",
  "humidifier",
  "heater",
  "switch",
  "socket",
  "sensor",
];

/**
 * The device the power button toggles: the first of the most prominent
 * type, else the first device
 */
export const findPrimaryDevice = (
  registry: DeviceRegistry
): DeviceRecord | undefined => {
  const records = Object.values(registry);
  for (const type of PRIMARY_TYPES) {
    const record = records.find(record => record.type === type);
    if (record) {
      return record;
    }
  }
  return records[0];
};

/**
 * POWER toggles the primary device; the volume rocker steps brightness of
 * the first dimmable device, or temperature when nothing is dimmable.
 */
export const createButtonMapping = (
  registry: DeviceRegistry
): ButtonMapping[] => {
  const records = Object.values(registry);
  const mappings: ButtonMapping[] = [];

  const primary = findPrimaryDevice(registry);
  if (primary) {
    mappings.push({
      button: "POWER",
      shortPress: `${cleanCommandName(primary.name)}_TOGGLE`,
    });
  }

  const dimmable = records.find(record => record.supports_brightness);
  const heated = records.find(record => record.supports_temperature);

  if (dimmable) {
    const prefix = cleanCommandName(dimmable.name);
    mappings.push(
      { button: "VOLUME_UP", shortPress: `${prefix}_BRIGHTNESS_UP` },
      { button: "VOLUME_DOWN", shortPress: `${prefix}_BRIGHTNESS_DOWN` }
    );
  } else if (heated) {
    const prefix = cleanCommandName(heated.name);
    mappings.push(
      { button: "VOLUME_UP", shortPress: `${prefix}_TEMP_UP` },
      { button: "VOLUME_DOWN", shortPress: `${prefix}_TEMP_DOWN` }
    );
  }

  return mappings;
};
