/**
 * Capability normalizer
 * Turns vendor capability descriptors into a closed set of tagged
 * capability variants and folds them into a fixed-shape summary.
 */

import { match, P } from "ts-pattern";
import { z } from "zod";
import { CAPABILITY_TYPES as T, type CapabilityDescriptor } from "./schema.ts";

export interface Range {
  min: number;
  max: number;
}

export interface WorkMode {
  instance: string;
  name: string;
  value: number;
}

export interface MusicMode {
  name: string;
  value: number;
}

export interface SceneOption {
  instance: string;
  name: string;
  // lightScene values are objects ({ id, paramId }), diyScene values numbers
  value: unknown;
}

export interface RangeControl {
  instance: string;
  label: string;
  range: Range;
}

export const DEFAULT_RANGES = {
  brightness: { min: 1, max: 100 },
  colorTemp: { min: 2000, max: 9000 },
  temperature: { min: 20, max: 100 },
  generic: { min: 0, max: 100 },
} as const satisfies Record<string, Range>;

export const GRADIENT_TOGGLE = "gradientToggle";
export const DREAMVIEW_TOGGLE = "dreamViewToggle";

export type Capability =
  | { kind: "power"; instance: string }
  | { kind: "brightness"; range?: Range }
  | { kind: "colorRgb" }
  | { kind: "colorTemperature"; range?: Range }
  | { kind: "temperature"; instance: string; slider: boolean; range?: Range }
  | { kind: "workMode"; instance: string; modes: WorkMode[] }
  | { kind: "musicMode"; instance: string; modes: MusicMode[] }
  | { kind: "scene"; instance: string; scenes: SceneOption[] }
  | { kind: "toggle"; instance: typeof GRADIENT_TOGGLE | typeof DREAMVIEW_TOGGLE }
  | { kind: "segmentedColor"; instance: string }
  | { kind: "timer"; instance: string }
  | { kind: "humidity"; range?: Range }
  | { kind: "range"; instance: string; range?: Range }
  | { kind: "custom"; descriptor: CapabilityDescriptor };

export type CapabilityKind = Capability["kind"];

export interface CapabilitySummary {
  supportsPower: boolean;
  supportsBrightness: boolean;
  supportsColor: boolean;
  supportsColorTemp: boolean;
  supportsScenes: boolean;
  supportsMusic: boolean;
  supportsTemperature: boolean;
  supportsWorkMode: boolean;
  supportsTimer: boolean;
  supportsHumidity: boolean;
  supportsFanMode: boolean;
  supportsGradient: boolean;
  supportsDreamview: boolean;
  supportsSegmented: boolean;
  brightnessRange: Range;
  colorTempRange: Range;
  temperatureRange: Range;
  workModes: WorkMode[];
  musicModes: MusicMode[];
  scenes: SceneOption[];
  rangeControls: RangeControl[];
  customCapabilities: CapabilityDescriptor[];
}

// Parameter fragments. Every schema is applied to one fragment at a time so
// a malformed sibling never discards the rest of the descriptor.

const BoundsSchema = z.object({
  min: z.number().optional(),
  max: z.number().optional(),
});

const RangeParametersSchema = z.object({ range: BoundsSchema });

const FieldsParametersSchema = z.object({ fields: z.array(z.unknown()) });

const FieldSchema = z.object({
  fieldName: z.string(),
  range: BoundsSchema.optional(),
  options: z.array(z.unknown()).optional(),
});

const OptionsParametersSchema = z.object({ options: z.array(z.unknown()) });

const NumericOptionSchema = z.object({ name: z.string(), value: z.number() });

const OptionSchema = z.object({ name: z.string(), value: z.unknown() });

type Field = z.infer<typeof FieldSchema>;

const toRange = (
  bounds: z.infer<typeof BoundsSchema>,
  fallback: Range
): Range => {
  const min = bounds.min ?? fallback.min;
  const max = bounds.max ?? fallback.max;
  return min <= max ? { min, max } : { min: max, max: min };
};

const parseFields = (parameters: unknown): Field[] => {
  const parsed = FieldsParametersSchema.safeParse(parameters);
  if (!parsed.success) {
    return [];
  }

  return parsed.data.fields.flatMap(field => {
    const result = FieldSchema.safeParse(field);
    return result.success ? [result.data] : [];
  });
};

const parseOptions = <S extends z.ZodType>(
  options: unknown[],
  schema: S
): z.infer<S>[] =>
  options.flatMap(option => {
    const result = schema.safeParse(option);
    return result.success ? [result.data] : [];
  });

/**
 * Reads `parameters.range`, filling absent bounds from `fallback`
 */
export const parseRange = (
  parameters: unknown,
  fallback: Range
): Range | undefined => {
  const parsed = RangeParametersSchema.safeParse(parameters);
  return parsed.success ? toRange(parsed.data.range, fallback) : undefined;
};

/**
 * Reads the range of the `temperature` field of a slider descriptor
 */
export const parseTemperatureRange = (parameters: unknown): Range | undefined => {
  const field = parseFields(parameters).find(
    ({ fieldName, range }) => fieldName === "temperature" && range
  );
  return field?.range
    ? toRange(field.range, DEFAULT_RANGES.temperature)
    : undefined;
};

export const parseWorkModes = (
  instance: string,
  parameters: unknown
): WorkMode[] =>
  parseFields(parameters)
    .filter(({ fieldName }) => fieldName === "workMode")
    .flatMap(({ options = [] }) => parseOptions(options, NumericOptionSchema))
    .map(({ name, value }) => ({ instance, name, value }));

export const parseMusicModes = (parameters: unknown): MusicMode[] =>
  parseFields(parameters)
    .filter(({ fieldName }) => fieldName === "musicMode")
    .flatMap(({ options = [] }) => parseOptions(options, NumericOptionSchema));

export const parseSceneOptions = (
  instance: string,
  parameters: unknown
): SceneOption[] => {
  const parsed = OptionsParametersSchema.safeParse(parameters);
  return parsed.success
    ? parseOptions(parsed.data.options, OptionSchema).map(({ name, value }) => ({
        instance,
        name,
        value,
      }))
    : [];
};

/**
 * Classifies one descriptor by its (type, instance) pair
 */
export const parseCapability = (
  descriptor: CapabilityDescriptor
): Capability =>
  match<CapabilityDescriptor, Capability>(descriptor)
    .with({ type: T.ON_OFF }, ({ instance }) => ({ kind: "power", instance }))
    .with({ type: T.RANGE, instance: "brightness" }, ({ parameters }) => ({
      kind: "brightness",
      range: parseRange(parameters, DEFAULT_RANGES.brightness),
    }))
    .with({ type: T.RANGE, instance: "temperature" }, ({ parameters }) => ({
      kind: "temperature",
      instance: "temperature",
      slider: false,
      range: parseRange(parameters, DEFAULT_RANGES.temperature),
    }))
    .with({ type: T.RANGE, instance: "humidity" }, ({ parameters }) => ({
      kind: "humidity",
      range: parseRange(parameters, DEFAULT_RANGES.generic),
    }))
    .with({ type: T.RANGE }, ({ instance, parameters }) => ({
      kind: "range",
      instance,
      range: parseRange(parameters, DEFAULT_RANGES.generic),
    }))
    .with({ type: T.COLOR_SETTING, instance: "colorRgb" }, () => ({
      kind: "colorRgb",
    }))
    .with(
      { type: T.COLOR_SETTING, instance: "colorTemperatureK" },
      ({ parameters }) => ({
        kind: "colorTemperature",
        range: parseRange(parameters, DEFAULT_RANGES.colorTemp),
      })
    )
    .with({ type: T.TEMPERATURE_SETTING }, ({ instance, parameters }) => ({
      kind: "temperature",
      instance,
      slider: instance === "sliderTemperature",
      range:
        instance === "sliderTemperature"
          ? parseTemperatureRange(parameters)
          : undefined,
    }))
    .with({ type: T.WORK_MODE }, ({ instance, parameters }) => ({
      kind: "workMode",
      instance,
      modes: parseWorkModes(instance, parameters),
    }))
    .with({ type: T.MUSIC_SETTING }, ({ instance, parameters }) => ({
      kind: "musicMode",
      instance,
      modes: instance === "musicMode" ? parseMusicModes(parameters) : [],
    }))
    .with({ type: T.DYNAMIC_SCENE }, ({ instance, parameters }) => ({
      kind: "scene",
      instance,
      scenes: parseSceneOptions(instance, parameters),
    }))
    .with(
      {
        type: T.TOGGLE,
        instance: P.union(GRADIENT_TOGGLE, DREAMVIEW_TOGGLE),
      },
      ({ instance }) => ({ kind: "toggle", instance })
    )
    .with({ type: T.SEGMENT_COLOR_SETTING }, ({ instance }) => ({
      kind: "segmentedColor",
      instance,
    }))
    .with({ type: T.TIMER }, ({ instance }) => ({ kind: "timer", instance }))
    .otherwise(descriptor => ({ kind: "custom", descriptor }));

export const emptySummary = (): CapabilitySummary => ({
  supportsPower: false,
  supportsBrightness: false,
  supportsColor: false,
  supportsColorTemp: false,
  supportsScenes: false,
  supportsMusic: false,
  supportsTemperature: false,
  supportsWorkMode: false,
  supportsTimer: false,
  supportsHumidity: false,
  supportsFanMode: false,
  supportsGradient: false,
  supportsDreamview: false,
  supportsSegmented: false,
  brightnessRange: { ...DEFAULT_RANGES.brightness },
  colorTempRange: { ...DEFAULT_RANGES.colorTemp },
  temperatureRange: { ...DEFAULT_RANGES.temperature },
  workModes: [],
  musicModes: [],
  scenes: [],
  rangeControls: [],
  customCapabilities: [],
});

/**
 * Folds parsed capabilities into a summary. Flags and ranges do not depend
 * on descriptor order; list fields keep encounter order. A slider
 * temperature range takes precedence over a plain `range/temperature` one.
 */
export const summarize = (capabilities: Capability[]): CapabilitySummary => {
  const summary = emptySummary();
  let sliderTemperature: Range | undefined;
  let plainTemperature: Range | undefined;

  for (const capability of capabilities) {
    match(capability)
      .with({ kind: "power" }, () => {
        summary.supportsPower = true;
      })
      .with({ kind: "brightness" }, ({ range }) => {
        summary.supportsBrightness = true;
        summary.brightnessRange = range ?? summary.brightnessRange;
      })
      .with({ kind: "colorRgb" }, () => {
        summary.supportsColor = true;
      })
      .with({ kind: "colorTemperature" }, ({ range }) => {
        summary.supportsColorTemp = true;
        summary.colorTempRange = range ?? summary.colorTempRange;
      })
      .with({ kind: "temperature" }, ({ slider, range }) => {
        summary.supportsTemperature = true;
        if (slider) {
          sliderTemperature ??= range;
        } else {
          plainTemperature ??= range;
        }
      })
      .with({ kind: "workMode" }, ({ instance, modes }) => {
        summary.supportsWorkMode = true;
        summary.supportsFanMode ||= instance === "fanMode";
        summary.workModes.push(...modes);
      })
      .with({ kind: "musicMode" }, ({ modes }) => {
        summary.supportsMusic = true;
        summary.musicModes.push(...modes);
      })
      .with({ kind: "scene" }, ({ scenes }) => {
        summary.supportsScenes = true;
        summary.scenes.push(...scenes);
      })
      .with({ kind: "toggle", instance: GRADIENT_TOGGLE }, () => {
        summary.supportsGradient = true;
      })
      .with({ kind: "toggle", instance: DREAMVIEW_TOGGLE }, () => {
        summary.supportsDreamview = true;
      })
      .with({ kind: "segmentedColor" }, () => {
        summary.supportsSegmented = true;
      })
      .with({ kind: "timer" }, () => {
        summary.supportsTimer = true;
      })
      .with({ kind: "humidity" }, () => {
        summary.supportsHumidity = true;
      })
      .with({ kind: "range" }, ({ instance, range }) => {
        summary.rangeControls.push({
          instance,
          label: instance,
          range: range ?? { ...DEFAULT_RANGES.generic },
        });
      })
      .with({ kind: "custom" }, ({ descriptor }) => {
        summary.customCapabilities.push(descriptor);
      })
      .exhaustive();
  }

  summary.temperatureRange =
    sliderTemperature ?? plainTemperature ?? summary.temperatureRange;
  return summary;
};

export const summarizeCapabilities = (
  descriptors: CapabilityDescriptor[]
): CapabilitySummary => summarize(descriptors.map(parseCapability));
