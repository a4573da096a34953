import { z } from "zod";

// Response shapes of the Govee OpenAPI "router" endpoints
// https://developer.govee.com/reference/get-you-devices

/**
 * A capability descriptor as listed by `/user/devices`. Parameters are kept
 * opaque here; the capability parsers descend into them.
 */
export const CapabilityDescriptorSchema = z.looseObject({
  type: z.string(),
  instance: z.string().default(""),
  parameters: z.unknown().optional(),
});

export type CapabilityDescriptor = z.infer<typeof CapabilityDescriptorSchema>;

export const RawDeviceSchema = z.looseObject({
  sku: z.string().default(""),
  device: z.string(),
  deviceName: z.string().optional(),
  type: z.string().default(""),
  capabilities: z.array(CapabilityDescriptorSchema).default([]),
});

export type RawDevice = z.infer<typeof RawDeviceSchema>;

// Devices are validated one at a time so a single odd entry does not hide
// the rest of the account
export const DeviceListResponseSchema = z.looseObject({
  code: z.number(),
  message: z.string().optional(),
  data: z.array(z.unknown()).default([]),
});

const CapabilityStateSchema = z.looseObject({
  type: z.string(),
  instance: z.string().default(""),
  state: z.looseObject({ value: z.unknown() }).optional(),
});

export type CapabilityState = z.infer<typeof CapabilityStateSchema>;

const StatePayloadSchema = z.looseObject({
  sku: z.string().optional(),
  device: z.string().optional(),
  capabilities: z.array(CapabilityStateSchema).default([]),
});

export type DeviceStatePayload = z.infer<typeof StatePayloadSchema>;

// State responses carry the payload under `payload`; some gateways answer
// with `data` instead
export const DeviceStateResponseSchema = z
  .looseObject({
    code: z.number(),
    msg: z.string().optional(),
    payload: StatePayloadSchema.optional(),
    data: StatePayloadSchema.optional(),
  })
  .transform(({ code, msg, payload, data }) => ({
    code,
    msg,
    payload: payload ?? data ?? { capabilities: [] },
  }));

export const ControlResponseSchema = z.looseObject({
  code: z.number(),
  msg: z.string().optional(),
  message: z.string().optional(),
});

/**
 * Envelope fields shared by every endpoint, used to classify failures
 * before the endpoint-specific schema is applied.
 */
export const EnvelopeSchema = z.looseObject({
  code: z.number().optional(),
  msg: z.string().optional(),
  message: z.string().optional(),
});

export const CAPABILITY_TYPES = {
  ON_OFF: "devices.capabilities.on_off",
  TOGGLE: "devices.capabilities.toggle",
  RANGE: "devices.capabilities.range",
  COLOR_SETTING: "devices.capabilities.color_setting",
  SEGMENT_COLOR_SETTING: "devices.capabilities.segment_color_setting",
  MUSIC_SETTING: "devices.capabilities.music_setting",
  DYNAMIC_SCENE: "devices.capabilities.dynamic_scene",
  WORK_MODE: "devices.capabilities.work_mode",
  TEMPERATURE_SETTING: "devices.capabilities.temperature_setting",
  TIMER: "devices.capabilities.timer",
} as const;

export const DEVICE_TYPES = [
  "sync_box",
  "light",
  "switch",
  "socket",
  "kettle",
  "humidifier",
  "air_purifier",
  "heater",
  "thermometer",
  "sensor",
  "fan",
  "dehumidifier",
  "ice_maker",
  "aroma_diffuser",
  "appliance",
] as const;

export type DeviceType = (typeof DEVICE_TYPES)[number];
