import { vi } from "vitest";
import type { GoveeApi } from "../src/govee/client.ts";
import { GoveeDevice } from "../src/govee/device.ts";
import {
  CAPABILITY_TYPES as T,
  type CapabilityDescriptor,
  type RawDevice,
} from "../src/govee/schema.ts";
import {
  DeviceRecordSchema,
  type DeviceRecord,
} from "../src/registry/schema.ts";

export const capability = (
  type: string,
  instance: string,
  parameters?: unknown
): CapabilityDescriptor =>
  parameters === undefined ? { type, instance } : { type, instance, parameters };

export const POWER = capability(T.ON_OFF, "powerSwitch");

export const BRIGHTNESS = capability(T.RANGE, "brightness", {
  unit: "unit.percent",
  dataType: "INTEGER",
  range: { min: 1, max: 100, precision: 1 },
});

export const COLOR_RGB = capability(T.COLOR_SETTING, "colorRgb", {
  dataType: "INTEGER",
  range: { min: 0, max: 16_777_215, precision: 1 },
});

export const COLOR_TEMPERATURE = capability(
  T.COLOR_SETTING,
  "colorTemperatureK",
  { dataType: "INTEGER", range: { min: 2700, max: 6500, precision: 1 } }
);

export const LIGHT_SCENES = capability(T.DYNAMIC_SCENE, "lightScene", {
  dataType: "ENUM",
  options: [
    { name: "Sunrise", value: { id: 101, paramId: 201 } },
    { name: "Rainbow", value: { id: 102, paramId: 202 } },
    { name: "Kid's Room", value: { id: 103, paramId: 203 } },
  ],
});

export const GRADIENT = capability(T.TOGGLE, "gradientToggle", {
  dataType: "ENUM",
  options: [
    { name: "on", value: 1 },
    { name: "off", value: 0 },
  ],
});

export const DREAMVIEW = capability(T.TOGGLE, "dreamViewToggle", {
  dataType: "ENUM",
  options: [
    { name: "on", value: 1 },
    { name: "off", value: 0 },
  ],
});

export const MUSIC_MODE = capability(T.MUSIC_SETTING, "musicMode", {
  dataType: "STRUCT",
  fields: [
    {
      fieldName: "musicMode",
      dataType: "ENUM",
      options: [
        { name: "Energic", value: 5 },
        { name: "Rhythm", value: 3 },
        { name: "Spectrum", value: 4 },
        { name: "Rolling", value: 6 },
        { name: "Separation", value: 7 },
      ],
    },
    {
      fieldName: "sensitivity",
      dataType: "INTEGER",
      range: { min: 0, max: 100, precision: 1 },
    },
  ],
});

export const KETTLE_WORK_MODE = capability(T.WORK_MODE, "workMode", {
  dataType: "STRUCT",
  fields: [
    {
      fieldName: "workMode",
      dataType: "ENUM",
      options: [
        { name: "DIY", value: 1 },
        { name: "Tea", value: 2 },
        { name: "Coffee", value: 3 },
        { name: "Boiling", value: 4 },
      ],
    },
    { fieldName: "modeValue", dataType: "INTEGER" },
  ],
});

export const SLIDER_TEMPERATURE = capability(
  T.TEMPERATURE_SETTING,
  "sliderTemperature",
  {
    dataType: "STRUCT",
    fields: [
      {
        fieldName: "temperature",
        dataType: "INTEGER",
        range: { min: 40, max: 100, precision: 1 },
      },
      {
        fieldName: "unit",
        dataType: "ENUM",
        options: [{ name: "Celsius", value: "Celsius" }],
      },
    ],
  }
);

export const createRawDevice = (overrides: Partial<RawDevice> = {}): RawDevice => ({
  sku: "H6008",
  device: "AA:BB:CC:DD:EE:FF:00:01",
  deviceName: "Desk Lamp",
  type: "devices.types.light",
  capabilities: [POWER, BRIGHTNESS, COLOR_RGB, COLOR_TEMPERATURE],
  ...overrides,
});

export const createLight = (overrides: Partial<RawDevice> = {}): GoveeDevice =>
  GoveeDevice.fromApi(createRawDevice(overrides));

export const createSyncBox = (overrides: Partial<RawDevice> = {}): GoveeDevice =>
  GoveeDevice.fromApi(
    createRawDevice({
      sku: "H6604",
      device: "AA:BB:CC:DD:EE:FF:00:02",
      deviceName: "TV Box",
      type: "devices.types.light",
      capabilities: [POWER, BRIGHTNESS, COLOR_RGB, GRADIENT, DREAMVIEW, MUSIC_MODE],
      ...overrides,
    })
  );

export const createKettle = (overrides: Partial<RawDevice> = {}): GoveeDevice =>
  GoveeDevice.fromApi(
    createRawDevice({
      sku: "H7171",
      device: "AA:BB:CC:DD:EE:FF:00:03",
      deviceName: "Kettle",
      type: "devices.types.kettle",
      capabilities: [POWER, KETTLE_WORK_MODE, SLIDER_TEMPERATURE],
      ...overrides,
    })
  );

/**
 * Persisted record with every flag off unless given
 */
export const createRecord = (overrides: Partial<DeviceRecord> = {}): DeviceRecord =>
  DeviceRecordSchema.parse({
    name: "Desk Lamp",
    type: "light",
    api_type: "devices.types.light",
    sku: "H6008",
    ...overrides,
  });

export const createFakeApi = () => ({
  isConfigured: vi.fn<GoveeApi["isConfigured"]>(() => true),
  setApiKey: vi.fn<GoveeApi["setApiKey"]>(),
  verifyCredentials: vi.fn<GoveeApi["verifyCredentials"]>(async () => {}),
  testConnection: vi.fn<GoveeApi["testConnection"]>(async () => true),
  getDevices: vi.fn<GoveeApi["getDevices"]>(async () => []),
  getDeviceState: vi.fn<GoveeApi["getDeviceState"]>(async () => ({
    capabilities: [],
  })),
  turnOn: vi.fn<GoveeApi["turnOn"]>(async () => true),
  turnOff: vi.fn<GoveeApi["turnOff"]>(async () => true),
  setBrightness: vi.fn<GoveeApi["setBrightness"]>(async () => true),
  setColorRgb: vi.fn<GoveeApi["setColorRgb"]>(async () => true),
  setColorTemperature: vi.fn<GoveeApi["setColorTemperature"]>(async () => true),
  setTemperature: vi.fn<GoveeApi["setTemperature"]>(async () => true),
  setWorkMode: vi.fn<GoveeApi["setWorkMode"]>(async () => true),
  setScene: vi.fn<GoveeApi["setScene"]>(async () => true),
  setGradient: vi.fn<GoveeApi["setGradient"]>(async () => true),
  setDreamview: vi.fn<GoveeApi["setDreamview"]>(async () => true),
  setMusicMode: vi.fn<GoveeApi["setMusicMode"]>(async () => true),
});

export type FakeApi = ReturnType<typeof createFakeApi>;
