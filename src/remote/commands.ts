import type { DeviceRecord, DeviceRegistry } from "../registry/schema.ts";
import { cleanCommandName, optionToken } from "./naming.ts";

export const NO_DEVICES = "NO_DEVICES";
export const GLOBAL_COMMANDS = ["ALL_ON", "ALL_OFF", "ALL_TOGGLE"] as const;

export type GlobalCommand = (typeof GLOBAL_COMMANDS)[number];

export const COLORS = {
  RED: 16_711_680,
  GREEN: 65_280,
  BLUE: 255,
  WHITE: 16_777_215,
  WARM: 16_753_920,
  COOL: 11_593_983,
} as const;

export type ColorName = keyof typeof COLORS;

export const BRIGHTNESS_PRESETS = [25, 50, 75, 100] as const;
export const TEMPERATURE_PRESETS = [60, 70, 80, 90, 100] as const;

export const MAX_WORK_MODE_COMMANDS = 5;
export const MAX_SCENE_COMMANDS = 10;

export const isGlobalCommand = (command: string): command is GlobalCommand =>
  GLOBAL_COMMANDS.some(global => global === command);

export const deviceCommands = (record: DeviceRecord): string[] => {
  const prefix = cleanCommandName(record.name);
  const actions: string[] = [];

  if (record.supports_power) {
    actions.push("ON", "OFF", "TOGGLE");
  }

  if (record.type === "sync_box") {
    if (record.supports_dreamview) {
      actions.push("DREAMVIEW_ON", "DREAMVIEW_OFF");
    }
    if (record.supports_gradient) {
      actions.push("GRADIENT_ON", "GRADIENT_OFF");
    }
    if (record.supports_music) {
      actions.push(
        ...record.music_modes
          .map(({ name }) => optionToken(name))
          .filter(token => token !== "")
          .map(token => `MUSIC_${token}`),
        "SENSITIVITY_UP",
        "SENSITIVITY_DOWN"
      );
    }
  }

  if (record.supports_brightness) {
    actions.push(
      "BRIGHTNESS_UP",
      "BRIGHTNESS_DOWN",
      ...BRIGHTNESS_PRESETS.map(value => `BRIGHTNESS_${value}`)
    );
  }

  if (record.supports_color) {
    actions.push(...Object.keys(COLORS).map(color => `COLOR_${color}`));
  }

  // presets are emitted whatever the device range; the UI adapts instead
  if (record.supports_temperature) {
    actions.push(
      "TEMP_UP",
      "TEMP_DOWN",
      ...TEMPERATURE_PRESETS.map(value => `TEMP_${value}`)
    );
  }

  if (record.supports_work_mode) {
    actions.push(
      ...record.work_modes
        .slice(0, MAX_WORK_MODE_COMMANDS)
        .map(({ name }) => optionToken(name))
        .filter(token => token !== "")
        .map(token => `MODE_${token}`)
    );
  }

  if (record.supports_scenes) {
    actions.push(
      ...record.scenes
        .slice(0, MAX_SCENE_COMMANDS)
        .map(({ name }) => optionToken(name, true))
        .filter(token => token !== "")
        .map(token => `SCENE_${token}`)
    );
  }

  return actions.map(action => `${prefix}_${action}`);
};

/**
 * Flat, sorted and deduplicated command identifiers for the registry
 */
export const generateCommands = (registry: DeviceRegistry): string[] => {
  const records = Object.values(registry);
  if (records.length === 0) {
    return [NO_DEVICES];
  }

  const commands = new Set(records.flatMap(deviceCommands));
  if (records.length > 1) {
    GLOBAL_COMMANDS.forEach(command => commands.add(command));
  }

  // code unit order, independent of locale
  return [...commands].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
};
