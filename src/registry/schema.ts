import { z } from "zod";
import { CapabilityDescriptorSchema, DEVICE_TYPES } from "../govee/schema.ts";

// Persisted shape of config.json. Field names are snake_case because the
// file is shared with earlier releases of the integration.

const RangeTupleSchema = z.tuple([z.number(), z.number()]).nullable();

export type RangeTuple = z.infer<typeof RangeTupleSchema>;

const WorkModeSchema = z.object({
  instance: z.string().default(""),
  name: z.string(),
  value: z.number(),
});

const MusicModeSchema = z.object({
  name: z.string(),
  value: z.number(),
});

const SceneSchema = z.object({
  instance: z.string().default(""),
  name: z.string(),
  value: z.unknown(),
});

export const DeviceRecordSchema = z.object({
  name: z.string(),
  type: z.enum(DEVICE_TYPES).catch("sensor"),
  api_type: z.string().default(""),
  sku: z.string().default(""),
  capabilities: z.array(CapabilityDescriptorSchema).default([]),
  supports_power: z.boolean().default(false),
  supports_brightness: z.boolean().default(false),
  supports_color: z.boolean().default(false),
  supports_color_temp: z.boolean().default(false),
  supports_scenes: z.boolean().default(false),
  supports_music: z.boolean().default(false),
  supports_temperature: z.boolean().default(false),
  supports_work_mode: z.boolean().default(false),
  supports_timer: z.boolean().default(false),
  supports_humidity: z.boolean().default(false),
  supports_fan_mode: z.boolean().default(false),
  supports_gradient: z.boolean().default(false),
  supports_dreamview: z.boolean().default(false),
  supports_segmented: z.boolean().default(false),
  brightness_range: RangeTupleSchema.default(null),
  color_temp_range: RangeTupleSchema.default(null),
  temperature_range: RangeTupleSchema.default(null),
  work_modes: z.array(WorkModeSchema).default([]),
  music_modes: z.array(MusicModeSchema).default([]),
  scenes: z.array(SceneSchema).default([]),
});

export type DeviceRecord = z.infer<typeof DeviceRecordSchema>;

/**
 * Devices keyed by vendor device id, in discovery order
 */
export type DeviceRegistry = Record<string, DeviceRecord>;

export const MIN_POLLING_INTERVAL = 10;
export const MAX_POLLING_INTERVAL = 300;
export const DEFAULT_POLLING_INTERVAL = 30;

export const ConfigFileSchema = z.object({
  api_key: z.string().nullable().default(null),
  devices: z.record(z.string(), DeviceRecordSchema).default({}),
  polling_interval: z.number().int().default(DEFAULT_POLLING_INTERVAL),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
