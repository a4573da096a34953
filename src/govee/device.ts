import type { DeviceRecord, RangeTuple } from "../registry/schema.ts";
import {
  summarizeCapabilities,
  type CapabilitySummary,
  type MusicMode,
  type Range,
  type SceneOption,
  type WorkMode,
} from "./capabilities.ts";
import type {
  CapabilityDescriptor,
  DeviceType,
  RawDevice,
} from "./schema.ts";

export const SYNC_BOX_SKUS: ReadonlySet<string> = new Set([
  "H6603",
  "H6604",
  "H8604",
]);

const API_TYPES: Readonly<Record<string, DeviceType>> = {
  "devices.types.light": "light",
  "devices.types.switch": "switch",
  "devices.types.socket": "socket",
  "devices.types.kettle": "kettle",
  "devices.types.humidifier": "humidifier",
  "devices.types.air_purifier": "air_purifier",
  "devices.types.heater": "heater",
  "devices.types.thermometer": "thermometer",
  "devices.types.air_quality_monitor": "sensor",
  "devices.types.fan": "fan",
  "devices.types.dehumidifier": "dehumidifier",
  "devices.types.ice_maker": "ice_maker",
  "devices.types.aroma_diffuser": "aroma_diffuser",
};

/**
 * Sync box SKUs first, then the vendor type tag, then a guess from the
 * capability flags.
 */
export const classifyDevice = (
  sku: string,
  apiType: string,
  summary: CapabilitySummary
): DeviceType => {
  if (SYNC_BOX_SKUS.has(sku)) {
    return "sync_box";
  }

  const mapped = Object.hasOwn(API_TYPES, apiType)
    ? API_TYPES[apiType]
    : undefined;
  if (mapped) {
    return mapped;
  }

  if (summary.supportsColor || summary.supportsBrightness) {
    return "light";
  }
  if (summary.supportsWorkMode || summary.supportsTemperature) {
    return "appliance";
  }
  return summary.supportsPower ? "switch" : "sensor";
};

const toTuple = (supported: boolean, range: Range): RangeTuple =>
  supported ? [range.min, range.max] : null;

/**
 * One vendor device: identity, raw capability list and the summary derived
 * from it. Instances are rebuilt on every discovery and never mutated.
 */
export class GoveeDevice {
  readonly sku: string;
  readonly id: string;
  readonly name: string;
  readonly apiType: string;
  readonly capabilities: readonly CapabilityDescriptor[];
  readonly summary: CapabilitySummary;
  readonly type: DeviceType;

  private constructor(raw: RawDevice) {
    this.sku = raw.sku;
    this.id = raw.device;
    this.name = raw.deviceName || `Govee ${raw.sku}`;
    this.apiType = raw.type;
    this.capabilities = raw.capabilities;
    this.summary = summarizeCapabilities(raw.capabilities);
    this.type = classifyDevice(this.sku, this.apiType, this.summary);
  }

  static fromApi = (raw: RawDevice): GoveeDevice => new GoveeDevice(raw);

  /**
   * Rebuilds a device from its persisted projection. The summary is derived
   * again from the stored descriptors.
   */
  static fromRecord = (id: string, record: DeviceRecord): GoveeDevice =>
    new GoveeDevice({
      sku: record.sku,
      device: id,
      deviceName: record.name,
      type: record.api_type,
      capabilities: record.capabilities,
    });

  classify = (): DeviceType => this.type;

  get brightnessRange(): Range {
    return this.summary.brightnessRange;
  }

  get colorTempRange(): Range {
    return this.summary.colorTempRange;
  }

  get temperatureRange(): Range {
    return this.summary.temperatureRange;
  }

  get workModes(): WorkMode[] {
    return this.summary.workModes;
  }

  get musicModes(): MusicMode[] {
    return this.summary.musicModes;
  }

  get scenes(): SceneOption[] {
    return this.summary.scenes;
  }

  toRecord = (): DeviceRecord => {
    const summary = this.summary;
    return {
      name: this.name,
      type: this.type,
      api_type: this.apiType,
      sku: this.sku,
      capabilities: [...this.capabilities],
      supports_power: summary.supportsPower,
      supports_brightness: summary.supportsBrightness,
      supports_color: summary.supportsColor,
      supports_color_temp: summary.supportsColorTemp,
      supports_scenes: summary.supportsScenes,
      supports_music: summary.supportsMusic,
      supports_temperature: summary.supportsTemperature,
      supports_work_mode: summary.supportsWorkMode,
      supports_timer: summary.supportsTimer,
      supports_humidity: summary.supportsHumidity,
      supports_fan_mode: summary.supportsFanMode,
      supports_gradient: summary.supportsGradient,
      supports_dreamview: summary.supportsDreamview,
      supports_segmented: summary.supportsSegmented,
      brightness_range: toTuple(
        summary.supportsBrightness,
        summary.brightnessRange
      ),
      color_temp_range: toTuple(
        summary.supportsColorTemp,
        summary.colorTempRange
      ),
      temperature_range: toTuple(
        summary.supportsTemperature,
        summary.temperatureRange
      ),
      work_modes: summary.workModes.map(mode => ({ ...mode })),
      music_modes: summary.musicModes.map(mode => ({ ...mode })),
      scenes: summary.scenes.map(scene => ({ ...scene })),
    };
  };

  toString = (): string =>
    `GoveeDevice(sku=${this.sku}, id=${this.id}, name=${this.name}, type=${this.type}, apiType=${this.apiType})`;
}
