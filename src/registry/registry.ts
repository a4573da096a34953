import type { GoveeDevice } from "../govee/device.ts";
import { createLogger } from "../logger.ts";
import { NO_DEVICES } from "../remote/commands.ts";
import { cleanCommandName } from "../remote/naming.ts";
import type { DeviceRegistry } from "./schema.ts";

const log = createLogger("registry");

// a device named "All" would own ALL_ON, one named "No Devices" the placeholder
const RESERVED_PREFIXES = ["ALL", NO_DEVICES];

/**
 * Picks a display name whose command prefix no earlier device uses and
 * that is not reserved. "Lamp" stays "Lamp"; a second "Lamp" (or "lamp!")
 * becomes "Lamp 2", and "All" becomes "All 2".
 */
const uniqueName = (name: string, fallback: string, taken: Set<string>) => {
  const base = cleanCommandName(name) ? name : fallback;
  let candidate = base;
  for (let n = 2; taken.has(cleanCommandName(candidate)); n++) {
    candidate = `${base} ${n}`;
  }
  return candidate;
};

/**
 * Projects discovered devices into the persisted registry, keyed by device
 * id in discovery order, with every command prefix unique.
 */
export const buildRegistry = (devices: GoveeDevice[]): DeviceRegistry => {
  const taken = new Set<string>(RESERVED_PREFIXES);
  const registry: DeviceRegistry = {};

  devices.forEach((device, index) => {
    const record = device.toRecord();
    const name = uniqueName(record.name, `Device ${index + 1}`, taken);
    if (name !== record.name) {
      log.info("registry.renamed", { deviceId: device.id, from: record.name, to: name });
    }

    taken.add(cleanCommandName(name));
    registry[device.id] = { ...record, name };
  });

  return registry;
};

