/**
 * UI page generation
 *
 * One directory page plus one control page per SKU group, each laid out on
 * a 4 x 6 grid. Blocks are placed top to bottom; a block that does not fit
 * in the remaining rows is skipped whole. Layout functions return the next
 * free row.
 */

import type { DeviceType } from "../govee/schema.ts";
import { GRID, uiText, type UiItem, type UiPage } from "../host/types.ts";
import type { DeviceRecord, DeviceRegistry } from "../registry/schema.ts";
import { BRIGHTNESS_PRESETS } from "./commands.ts";
import { cleanCommandName, optionToken } from "./naming.ts";

export const DIRECTORY_TITLE = "Govee Devices";

const FRIENDLY_NAMES: Partial<Record<DeviceType, string>> = {
  sync_box: "Sync Boxes",
  kettle: "Kettles",
  light: "Lights",
  humidifier: "Humidifiers",
  heater: "Heaters",
  switch: "Switches",
  socket: "Smart Plugs",
  sensor: "Sensors",
  thermometer: "Thermometers",
};

const DIRECTORY_NAME_LENGTH = 18;
const LIST_NAME_LENGTH = 12;
const WORK_MODE_LABEL_LENGTH = 6;
const MUSIC_MODE_LABEL_LENGTH = 7;
const MAX_MODE_BUTTONS = 4;

export interface SkuGroup {
  sku: string;
  devices: DeviceRecord[];
}

/**
 * A page under construction
 */
export class PageLayout {
  private readonly items: UiItem[] = [];
  private readonly pageId: string;
  private readonly name: string;

  constructor(pageId: string, name: string) {
    this.pageId = pageId;
    this.name = name;
  }

  text = (
    text: string,
    x: number,
    y: number,
    width = 1,
    command?: string
  ): this => {
    this.items.push(uiText(text, x, y, width, 1, command));
    return this;
  };

  fits = (row: number, rows: number): boolean => row + rows <= GRID.height;

  build = (): UiPage => ({
    pageId: this.pageId,
    name: this.name,
    grid: { ...GRID },
    items: [...this.items],
  });
}

/**
 * Groups devices by SKU in order of first appearance
 */
export const groupBySku = (registry: DeviceRegistry): SkuGroup[] => {
  const groups = new Map<string, DeviceRecord[]>();
  for (const record of Object.values(registry)) {
    const sku = record.sku || "Unknown";
    groups.set(sku, [...(groups.get(sku) ?? []), record]);
  }
  return [...groups].map(([sku, devices]) => ({ sku, devices }));
};

export const groupDisplayName = ({ sku, devices }: SkuGroup): string => {
  const type = devices[0]?.type;
  const friendly = (type && FRIENDLY_NAMES[type]) ?? "Devices";
  return devices.length > 1
    ? `${friendly} (${sku}) - ${devices.length} devices`
    : `${friendly} (${sku})`;
};

export const skuPageId = (sku: string): string =>
  `sku_${sku.replaceAll("-", "_").toLowerCase()}`;

const addPower = (page: PageLayout, prefix: string, row: number): number => {
  page
    .text("On", 0, row, 1, `${prefix}_ON`)
    .text("Off", 1, row, 1, `${prefix}_OFF`)
    .text("Toggle", 2, row, 2, `${prefix}_TOGGLE`);
  return row + 1;
};

const addBrightnessPresets = (
  page: PageLayout,
  prefix: string,
  row: number
): number => {
  BRIGHTNESS_PRESETS.forEach((value, column) =>
    page.text(`${value}%`, column, row, 1, `${prefix}_BRIGHTNESS_${value}`)
  );
  return row + 1;
};

const addColorSwatches = (
  page: PageLayout,
  prefix: string,
  row: number
): number => {
  page
    .text("Red", 0, row, 1, `${prefix}_COLOR_RED`)
    .text("Green", 1, row, 1, `${prefix}_COLOR_GREEN`)
    .text("Blue", 2, row, 1, `${prefix}_COLOR_BLUE`)
    .text("White", 3, row, 1, `${prefix}_COLOR_WHITE`);
  return row + 1;
};

/**
 * Sync boxes: power, DreamView, gradient, music modes with sensitivity,
 * brightness presets and colour swatches, one row each except music.
 */
export const addSyncBoxControls = (
  page: PageLayout,
  record: DeviceRecord,
  start: number
): number => {
  const prefix = cleanCommandName(record.name);
  let row = start;

  if (record.supports_power && page.fits(row, 1)) {
    row = addPower(page, prefix, row);
  }

  if (record.supports_dreamview && page.fits(row, 1)) {
    page
      .text("DreamView", 0, row, 2, `${prefix}_DREAMVIEW_ON`)
      .text("DV Off", 2, row, 2, `${prefix}_DREAMVIEW_OFF`);
    row += 1;
  }

  if (record.supports_gradient && page.fits(row, 1)) {
    page
      .text("Gradient", 0, row, 2, `${prefix}_GRADIENT_ON`)
      .text("Grad Off", 2, row, 2, `${prefix}_GRADIENT_OFF`);
    row += 1;
  }

  if (record.supports_music) {
    const modes = record.music_modes
      .filter(({ name }) => optionToken(name) !== "")
      .slice(0, MAX_MODE_BUTTONS);
    const rows = modes.length > 0 ? 2 : 1;

    if (page.fits(row, rows)) {
      if (modes.length > 0) {
        modes.forEach(({ name }, column) =>
          page.text(
            name.slice(0, MUSIC_MODE_LABEL_LENGTH),
            column,
            row,
            1,
            `${prefix}_MUSIC_${optionToken(name)}`
          )
        );
        row += 1;
      }
      page
        .text("Sens -", 0, row, 2, `${prefix}_SENSITIVITY_DOWN`)
        .text("Sens +", 2, row, 2, `${prefix}_SENSITIVITY_UP`);
      row += 1;
    }
  }

  if (record.supports_brightness && page.fits(row, 1)) {
    row = addBrightnessPresets(page, prefix, row);
  }

  if (record.supports_color && page.fits(row, 1)) {
    row = addColorSwatches(page, prefix, row);
  }

  return row;
};

/**
 * Temperature presets follow the device range: kettles (up to 100 °C and
 * beyond) get 60-90 plus stepping, room heaters 20-35.
 */
const addTemperature = (
  page: PageLayout,
  record: DeviceRecord,
  prefix: string,
  start: number
): number => {
  const [, max] = record.temperature_range ?? [20, 100];
  const presets = max >= 100 ? [60, 70, 80, 90] : max >= 40 ? [20, 25, 30, 35] : [];
  const stepping = max >= 100;
  const rows = (presets.length > 0 ? 1 : 0) + (stepping ? 1 : 0);

  if (rows === 0 || !page.fits(start, rows)) {
    return start;
  }

  let row = start;
  presets.forEach((value, column) =>
    page.text(`${value}°`, column, row, 1, `${prefix}_TEMP_${value}`)
  );
  row += 1;

  if (stepping) {
    page
      .text("Temp -", 0, row, 2, `${prefix}_TEMP_DOWN`)
      .text("Temp +", 2, row, 2, `${prefix}_TEMP_UP`);
    row += 1;
  }

  return row;
};

/**
 * Single non-sync device: power, temperature, then work modes or
 * brightness, then colours.
 */
export const addDeviceControls = (
  page: PageLayout,
  record: DeviceRecord,
  start: number
): number => {
  const prefix = cleanCommandName(record.name);
  let row = start;

  if (record.supports_power && page.fits(row, 1)) {
    row = addPower(page, prefix, row);
  }

  if (record.supports_temperature) {
    row = addTemperature(page, record, prefix, row);
  }

  const modes = record.supports_work_mode
    ? record.work_modes
        .filter(({ name }) => optionToken(name) !== "")
        .slice(0, MAX_MODE_BUTTONS)
    : [];

  if (modes.length > 0) {
    if (page.fits(row, 1)) {
      modes.forEach(({ name }, column) =>
        page.text(
          name.slice(0, WORK_MODE_LABEL_LENGTH),
          column,
          row,
          1,
          `${prefix}_MODE_${optionToken(name)}`
        )
      );
      row += 1;
    }
  } else if (record.supports_brightness && page.fits(row, 2)) {
    row = addBrightnessPresets(page, prefix, row);
    page
      .text("Bright -", 0, row, 2, `${prefix}_BRIGHTNESS_DOWN`)
      .text("Bright +", 2, row, 2, `${prefix}_BRIGHTNESS_UP`);
    row += 1;
  }

  if (record.supports_color && page.fits(row, 2)) {
    row = addColorSwatches(page, prefix, row);
    page
      .text("Warm", 0, row, 2, `${prefix}_COLOR_WARM`)
      .text("Cool", 2, row, 2, `${prefix}_COLOR_COOL`);
    row += 1;
  }

  return row;
};

/**
 * Several devices of one SKU: a name and toggle per device, with the
 * bottom row kept for All On / All Off.
 */
export const addDeviceList = (
  page: PageLayout,
  devices: DeviceRecord[],
  start: number
): number => {
  const lastRow = GRID.height - 1;
  let row = start;

  for (const record of devices) {
    if (row >= lastRow) {
      break;
    }

    page.text(record.name.slice(0, LIST_NAME_LENGTH), 0, row, 2);
    if (record.supports_power) {
      page.text("Toggle", 2, row, 2, `${cleanCommandName(record.name)}_TOGGLE`);
    }
    row += 1;
  }

  if (devices[0]?.supports_power) {
    page
      .text("All On", 0, lastRow, 2, "ALL_ON")
      .text("All Off", 2, lastRow, 2, "ALL_OFF");
    row = lastRow + 1;
  }

  return row;
};

export const createDirectoryPage = (registry: DeviceRegistry): UiPage => {
  const page = new PageLayout("main", DIRECTORY_TITLE).text(
    DIRECTORY_TITLE,
    0,
    0,
    GRID.width
  );
  let row = 1;

  for (const group of groupBySku(registry)) {
    if (row >= GRID.height) {
      break;
    }

    page.text(`${groupDisplayName(group)}:`, 0, row, GRID.width);
    row += 1;

    for (const record of group.devices) {
      if (row >= GRID.height) {
        break;
      }
      page.text(
        `• ${record.name.slice(0, DIRECTORY_NAME_LENGTH)}`,
        0,
        row,
        GRID.width
      );
      row += 1;
    }

    // blank row between groups
    row += 1;
  }

  const lastRow = GRID.height - 1;
  if (Object.keys(registry).length > 1 && row < lastRow) {
    page
      .text("All On", 0, lastRow, 2, "ALL_ON")
      .text("All Off", 2, lastRow, 2, "ALL_OFF");
  }

  return page.build();
};

export const createSkuPage = (group: SkuGroup): UiPage => {
  const name = groupDisplayName(group);
  const page = new PageLayout(skuPageId(group.sku), name).text(
    name,
    0,
    0,
    GRID.width
  );

  const [first] = group.devices;
  if (first?.type === "sync_box") {
    addSyncBoxControls(page, first, 1);
  } else if (first && group.devices.length === 1) {
    addDeviceControls(page, first, 1);
  } else {
    addDeviceList(page, group.devices, 1);
  }

  return page.build();
};

export const createUiPages = (registry: DeviceRegistry): UiPage[] => {
  if (Object.keys(registry).length === 0) {
    return [
      new PageLayout("main", "No Devices")
        .text("No devices found", 0, 0, GRID.width)
        .build(),
    ];
  }

  return [
    createDirectoryPage(registry),
    ...groupBySku(registry).map(createSkuPage),
  ];
};
