import * as Sentry from "@sentry/node";
import { match, P } from "ts-pattern";
import type { GoveeApi } from "../govee/client.ts";
import { GoveeDevice } from "../govee/device.ts";
import { createLogger } from "../logger.ts";
import type { DeviceRecord, DeviceRegistry } from "../registry/schema.ts";
import { COLORS, isGlobalCommand, NO_DEVICES, type GlobalCommand } from "./commands.ts";
import { cleanCommandName, matchesOption } from "./naming.ts";
import { Throttle } from "./throttle.ts";

const log = createLogger("remote:dispatcher");

export type DeviceAction =
  | { kind: "power"; on: boolean }
  | { kind: "toggle" }
  | { kind: "dreamview"; enabled: boolean }
  | { kind: "gradient"; enabled: boolean }
  | { kind: "music"; mode: number; sensitivity: number }
  | { kind: "brightness"; value: number }
  | { kind: "color"; rgb: number }
  | { kind: "temperature"; value: number }
  | { kind: "workMode"; instance: string; value: number }
  | { kind: "scene"; instance: string; value: unknown };

const MUSIC_SENSITIVITY = 50;
const SENSITIVITY_MODE = 1;
const SENSITIVITY_HIGH = 75;
const SENSITIVITY_LOW = 25;
const BRIGHTNESS_HIGH = 100;
const BRIGHTNESS_LOW = 20;
const TEMPERATURE_CEILING = 90;
const TEMPERATURE_FLOOR = 40;
const DEFAULT_TEMPERATURE_RANGE: [number, number] = [20, 100];

const KETTLE_MODES: Readonly<Record<string, number>> = {
  DIY: 1,
  TEA: 2,
  COFFEE: 3,
  BOILING: 4,
};

const isColorName = (name: string): name is keyof typeof COLORS =>
  Object.hasOwn(COLORS, name);

const when = (
  allowed: boolean,
  action: () => DeviceAction | undefined
): DeviceAction | undefined => (allowed ? action() : undefined);

const musicAction = (
  record: DeviceRecord,
  name: string
): DeviceAction | undefined => {
  const mode = record.music_modes.find(mode => matchesOption(name, mode.name));
  return mode
    ? { kind: "music", mode: mode.value, sensitivity: MUSIC_SENSITIVITY }
    : undefined;
};

const workModeAction = (
  record: DeviceRecord,
  name: string
): DeviceAction | undefined => {
  const mode = record.work_modes.find(mode => matchesOption(name, mode.name));
  if (mode) {
    return { kind: "workMode", instance: mode.instance, value: mode.value };
  }

  const kettleMode = Object.hasOwn(KETTLE_MODES, name.toUpperCase())
    ? KETTLE_MODES[name.toUpperCase()]
    : undefined;
  return kettleMode === undefined
    ? undefined
    : { kind: "workMode", instance: "workMode", value: kettleMode };
};

const sceneAction = (
  record: DeviceRecord,
  name: string
): DeviceAction | undefined => {
  const scene = record.scenes.find(scene =>
    matchesOption(name, scene.name, true)
  );
  return scene
    ? { kind: "scene", instance: scene.instance, value: scene.value }
    : undefined;
};

const temperatureAction = (
  record: DeviceRecord,
  target: string
): DeviceAction | undefined => {
  const [min, max] = record.temperature_range ?? DEFAULT_TEMPERATURE_RANGE;
  return match<string, DeviceAction | undefined>(target)
    .with("UP", () => ({
      kind: "temperature",
      value: Math.min(max, TEMPERATURE_CEILING),
    }))
    .with("DOWN", () => ({
      kind: "temperature",
      value: Math.max(min, TEMPERATURE_FLOOR),
    }))
    .with(P.string.regex(/^\d+$/), value => ({
      kind: "temperature",
      value: Number.parseInt(value, 10),
    }))
    .otherwise(() => undefined);
};

/**
 * Maps the action part of a command to what should be sent, or `undefined`
 * when the action is unknown or the device lacks the capability.
 */
export const mapAction = (
  action: string,
  record: DeviceRecord
): DeviceAction | undefined =>
  match<string, DeviceAction | undefined>(action)
    .with("ON", () => when(record.supports_power, () => ({ kind: "power", on: true })))
    .with("OFF", () => when(record.supports_power, () => ({ kind: "power", on: false })))
    .with("TOGGLE", () => when(record.supports_power, () => ({ kind: "toggle" })))
    .with(P.union("DREAMVIEW_ON", "DREAMVIEW_OFF"), action =>
      when(record.supports_dreamview, () => ({
        kind: "dreamview",
        enabled: action === "DREAMVIEW_ON",
      }))
    )
    .with(P.union("GRADIENT_ON", "GRADIENT_OFF"), action =>
      when(record.supports_gradient, () => ({
        kind: "gradient",
        enabled: action === "GRADIENT_ON",
      }))
    )
    .with(P.union("SENSITIVITY_UP", "SENSITIVITY_DOWN"), action =>
      when(record.supports_music, () => ({
        kind: "music",
        mode: SENSITIVITY_MODE,
        sensitivity:
          action === "SENSITIVITY_UP" ? SENSITIVITY_HIGH : SENSITIVITY_LOW,
      }))
    )
    .with(P.string.startsWith("MUSIC_"), action =>
      when(record.supports_music, () =>
        musicAction(record, action.slice("MUSIC_".length))
      )
    )
    .with(
      P.union(
        "BRIGHTNESS_UP",
        "BRIGHTNESS_DOWN",
        "BRIGHTNESS_25",
        "BRIGHTNESS_50",
        "BRIGHTNESS_75",
        "BRIGHTNESS_100"
      ),
      action =>
        when(record.supports_brightness, () => ({
          kind: "brightness",
          value: match(action)
            .with("BRIGHTNESS_UP", () => BRIGHTNESS_HIGH)
            .with("BRIGHTNESS_DOWN", () => BRIGHTNESS_LOW)
            .otherwise(action =>
              Number.parseInt(action.slice("BRIGHTNESS_".length), 10)
            ),
        }))
    )
    .with(P.string.startsWith("COLOR_"), action => {
      const color = action.slice("COLOR_".length);
      return when(record.supports_color, () =>
        isColorName(color) ? { kind: "color", rgb: COLORS[color] } : undefined
      );
    })
    .with(P.string.startsWith("TEMP_"), action =>
      when(record.supports_temperature, () =>
        temperatureAction(record, action.slice("TEMP_".length))
      )
    )
    .with(P.string.startsWith("MODE_"), action =>
      when(record.supports_work_mode, () =>
        workModeAction(record, action.slice("MODE_".length))
      )
    )
    .with(P.string.startsWith("SCENE_"), action =>
      when(record.supports_scenes, () =>
        sceneAction(record, action.slice("SCENE_".length))
      )
    )
    .otherwise(() => undefined);

interface ResolvedDevice {
  id: string;
  record: DeviceRecord;
  prefix: string;
  action?: DeviceAction;
}

/**
 * Resolves command identifiers against the device registry and sends them
 * through the API client. Owns the power state cache used for toggles and
 * the send throttle.
 */
export class CommandDispatcher {
  private readonly client: GoveeApi;
  private readonly registry: DeviceRegistry;
  private readonly throttle: Throttle;
  private readonly devices = new Map<string, GoveeDevice>();
  private readonly powerStates = new Map<string, boolean>();

  constructor(
    client: GoveeApi,
    registry: DeviceRegistry,
    throttle: Throttle = new Throttle()
  ) {
    this.client = client;
    this.registry = registry;
    this.throttle = throttle;
  }

  /**
   * Last known power state; devices never sent to count as off
   */
  isOn = (deviceId: string): boolean =>
    this.powerStates.get(deviceId) ?? false;

  execute = (command: string): Promise<boolean> =>
    Sentry.withScope(async scope => {
      scope.setTag("command", command);
      try {
        if (command === NO_DEVICES || Object.keys(this.registry).length === 0) {
          return false;
        }

        return isGlobalCommand(command)
          ? await this.executeGlobal(command)
          : await this.executeDevice(command);
      } catch (error) {
        log.error("dispatch.failed", error, { command });
        return false;
      }
    });

  /**
   * Polls power state of every power-capable device and overwrites the
   * cache with what the API reports. Failures keep the cached value.
   */
  refreshStates = async (): Promise<void> => {
    const entries = Object.entries(this.registry).filter(
      ([, record]) => record.supports_power
    );

    await Promise.allSettled(
      entries.map(async ([id, record]) => {
        try {
          const state = await this.client.getDeviceState(
            this.device(id, record)
          );
          const power = state.capabilities.find(
            ({ type, instance }) =>
              type === "devices.capabilities.on_off" &&
              instance === "powerSwitch"
          );
          const value = power?.state?.value;
          if (typeof value === "number" || typeof value === "boolean") {
            this.powerStates.set(id, Boolean(value));
          }
        } catch (error) {
          log.warn("state.refresh_failed", {
            deviceId: id,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      })
    );
  };

  /**
   * The device a command addresses. Matching prefixes are tried longest
   * first, equal prefixes in registry order, and the first device whose
   * capabilities accept the rest of the command wins; "LAMP_COLOR_RED"
   * reaches "Lamp" when "Lamp Color" cannot handle "RED". Without any such
   * device the longest match is returned with no action.
   */
  resolve = (command: string): ResolvedDevice | undefined => {
    const candidates = Object.entries(this.registry)
      .map(([id, record]) => ({ id, record, prefix: cleanCommandName(record.name) }))
      .filter(({ prefix }) => prefix !== "" && command.startsWith(`${prefix}_`))
      .sort((a, b) => b.prefix.length - a.prefix.length);

    for (const candidate of candidates) {
      const suffix = command.slice(candidate.prefix.length + 1);
      const action = mapAction(suffix, candidate.record);
      if (action) {
        return { ...candidate, action };
      }
    }
    return candidates[0];
  };

  private executeGlobal = async (command: GlobalCommand): Promise<boolean> => {
    const action = match<GlobalCommand, DeviceAction>(command)
      .with("ALL_ON", () => ({ kind: "power", on: true }))
      .with("ALL_OFF", () => ({ kind: "power", on: false }))
      .with("ALL_TOGGLE", () => ({ kind: "toggle" }))
      .exhaustive();

    const targets = Object.entries(this.registry).filter(
      ([, record]) => record.supports_power
    );
    if (targets.length === 0) {
      return false;
    }

    if (!this.throttle.acquireGlobal()) {
      log.debug("dispatch.throttled", { command });
      return true;
    }

    const results = await Promise.allSettled(
      targets.map(async ([id, record]) => {
        if (!this.throttle.acquireDevice(id)) {
          log.debug("dispatch.throttled", { command, deviceId: id });
          return true;
        }
        return this.perform(id, record, action);
      })
    );

    const succeeded = results.filter(
      result => result.status === "fulfilled" && result.value
    ).length;

    results.forEach((result, index) => {
      if (result.status === "rejected") {
        log.error("dispatch.device_failed", result.reason, {
          command,
          deviceId: targets[index]?.[0],
        });
      }
    });

    log.info("dispatch.fan_out", {
      command,
      devices: targets.length,
      succeeded,
    });
    return succeeded > 0;
  };

  private executeDevice = async (command: string): Promise<boolean> => {
    const resolved = this.resolve(command);
    if (!resolved) {
      log.debug("dispatch.unresolved", { command });
      return false;
    }

    const { id, record, action } = resolved;
    if (!action) {
      log.debug("dispatch.not_permitted", { command, deviceId: id });
      return false;
    }

    if (!this.throttle.acquire(id)) {
      log.debug("dispatch.throttled", { command, deviceId: id });
      return true;
    }

    return this.perform(id, record, action);
  };

  private perform = async (
    id: string,
    record: DeviceRecord,
    action: DeviceAction
  ): Promise<boolean> => {
    const device = this.device(id, record);
    const client = this.client;

    return match(action)
      .with({ kind: "power" }, ({ on }) => this.sendPower(device, on))
      .with({ kind: "toggle" }, () => this.sendPower(device, !this.isOn(id)))
      .with({ kind: "dreamview" }, ({ enabled }) =>
        client.setDreamview(device, enabled)
      )
      .with({ kind: "gradient" }, ({ enabled }) =>
        client.setGradient(device, enabled)
      )
      .with({ kind: "music" }, ({ mode, sensitivity }) =>
        client.setMusicMode(device, mode, sensitivity)
      )
      .with({ kind: "brightness" }, ({ value }) =>
        client.setBrightness(device, value)
      )
      .with({ kind: "color" }, ({ rgb }) => client.setColorRgb(device, rgb))
      .with({ kind: "temperature" }, ({ value }) =>
        client.setTemperature(device, value)
      )
      .with({ kind: "workMode" }, ({ instance, value }) =>
        client.setWorkMode(device, instance, value)
      )
      .with({ kind: "scene" }, ({ instance, value }) =>
        client.setScene(device, instance, value)
      )
      .exhaustive();
  };

  private sendPower = async (
    device: GoveeDevice,
    on: boolean
  ): Promise<boolean> => {
    const sent = on
      ? await this.client.turnOn(device)
      : await this.client.turnOff(device);
    if (sent) {
      this.powerStates.set(device.id, on);
    }
    log.debug("dispatch.power", { deviceId: device.id, on, sent });
    return sent;
  };

  private device = (id: string, record: DeviceRecord): GoveeDevice => {
    const cached = this.devices.get(id);
    if (cached) {
      return cached;
    }
    const device = GoveeDevice.fromRecord(id, record);
    this.devices.set(id, device);
    return device;
  };
}
