/**
 * Govee OpenAPI client
 *
 * Every request goes through a shared token bucket, carries the
 * `Govee-API-Key` header and is aborted after the configured timeout.
 * Listing and state reads reject with a `GoveeApiError`; control calls
 * resolve to a boolean and never reject.
 */

import * as Sentry from "@sentry/node";
import { fetch, type Dispatcher } from "undici";
import type { z } from "zod";
import appConfig from "../config.ts";
import { createLogger } from "../logger.ts";
import { clamp, safeParse, truncate } from "../utility.ts";
import { GoveeDevice } from "./device.ts";
import { TokenBucketLimiter } from "./limiter.ts";
import {
  CAPABILITY_TYPES as T,
  ControlResponseSchema,
  DeviceListResponseSchema,
  DeviceStateResponseSchema,
  EnvelopeSchema,
  RawDeviceSchema,
  type DeviceStatePayload,
} from "./schema.ts";

const log = createLogger("govee:client");

const DEVICES_PATH = "/router/api/v1/user/devices";
const STATE_PATH = "/router/api/v1/device/state";
const CONTROL_PATH = "/router/api/v1/device/control";

export const MAX_RGB = 16_777_215;

export type GoveeApiErrorKind =
  | "unauthorized"
  | "rate_limited"
  | "connection"
  | "malformed"
  | "other";

export class GoveeApiError extends Error {
  readonly kind: GoveeApiErrorKind;
  readonly code?: number;

  constructor(
    message: string,
    kind: GoveeApiErrorKind,
    code?: number,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "GoveeApiError";
    this.kind = kind;
    this.code = code;
  }

  static fromCode = (code: number, message: string): GoveeApiError =>
    new GoveeApiError(
      message,
      code === 401 ? "unauthorized" : code === 429 ? "rate_limited" : "other",
      code
    );
}

/**
 * Operations the rest of the integration needs from the vendor API
 */
export interface GoveeApi {
  isConfigured(): boolean;
  setApiKey(apiKey: string): void;
  verifyCredentials(): Promise<void>;
  testConnection(): Promise<boolean>;
  getDevices(): Promise<GoveeDevice[]>;
  getDeviceState(device: GoveeDevice): Promise<DeviceStatePayload>;
  turnOn(device: GoveeDevice): Promise<boolean>;
  turnOff(device: GoveeDevice): Promise<boolean>;
  setBrightness(device: GoveeDevice, brightness: number): Promise<boolean>;
  setColorRgb(device: GoveeDevice, rgb: number): Promise<boolean>;
  setColorTemperature(device: GoveeDevice, kelvin: number): Promise<boolean>;
  setTemperature(device: GoveeDevice, celsius: number): Promise<boolean>;
  setWorkMode(
    device: GoveeDevice,
    instance: string,
    value: number
  ): Promise<boolean>;
  setScene(device: GoveeDevice, instance: string, value: unknown): Promise<boolean>;
  setGradient(device: GoveeDevice, enabled: boolean): Promise<boolean>;
  setDreamview(device: GoveeDevice, enabled: boolean): Promise<boolean>;
  setMusicMode(
    device: GoveeDevice,
    mode: number,
    sensitivity: number
  ): Promise<boolean>;
}

export interface GoveeClientOptions {
  apiKey?: string;
  baseUrl?: string;
  timeout?: number;
  limiter?: TokenBucketLimiter;
  dispatcher?: Dispatcher;
}

const errorMessage = (envelope: z.infer<typeof EnvelopeSchema>) =>
  envelope.message ?? envelope.msg ?? "Unknown error";

export class GoveeClient implements GoveeApi {
  private apiKey: string;
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly limiter: TokenBucketLimiter;
  private readonly dispatcher?: Dispatcher;

  constructor({
    apiKey = "",
    baseUrl = appConfig.goveeApiBase,
    timeout = appConfig.requestTimeout,
    limiter = new TokenBucketLimiter(appConfig.rateLimit, appConfig.ratePeriod),
    dispatcher,
  }: GoveeClientOptions = {}) {
    this.apiKey = apiKey.trim();
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.timeout = timeout;
    this.limiter = limiter;
    this.dispatcher = dispatcher;
  }

  isConfigured = (): boolean => this.apiKey !== "";

  setApiKey = (apiKey: string): void => {
    this.apiKey = apiKey.trim();
  };

  /**
   * Lists devices once and discards the result; rejects with the classified
   * error when the key is refused or the API is unreachable.
   */
  verifyCredentials = async (): Promise<void> => {
    await this.request("GET", DEVICES_PATH, EnvelopeSchema);
  };

  testConnection = async (): Promise<boolean> => {
    try {
      await this.verifyCredentials();
      return true;
    } catch (error) {
      log.error("connection.test_failed", error);
      return false;
    }
  };

  getDevices = async (): Promise<GoveeDevice[]> => {
    const { data } = await this.request(
      "GET",
      DEVICES_PATH,
      DeviceListResponseSchema
    );

    const devices = data.flatMap(entry => {
      const parsed = RawDeviceSchema.safeParse(entry);
      if (!parsed.success) {
        log.warn("devices.skipped", { entry: truncate(entry, 200) });
        return [];
      }
      return [GoveeDevice.fromApi(parsed.data)];
    });

    log.info("devices.discovered", { count: devices.length });
    return devices;
  };

  getDeviceState = async (device: GoveeDevice): Promise<DeviceStatePayload> => {
    const { payload } = await this.request(
      "POST",
      STATE_PATH,
      DeviceStateResponseSchema,
      {
        requestId: crypto.randomUUID(),
        payload: { sku: device.sku, device: device.id },
      }
    );
    return payload;
  };

  turnOn = (device: GoveeDevice) =>
    this.control(device, T.ON_OFF, "powerSwitch", 1);

  turnOff = (device: GoveeDevice) =>
    this.control(device, T.ON_OFF, "powerSwitch", 0);

  setBrightness = (device: GoveeDevice, brightness: number) => {
    const { min, max } = device.brightnessRange;
    return this.control(
      device,
      T.RANGE,
      "brightness",
      clamp(Math.round(brightness), min, max)
    );
  };

  setColorRgb = (device: GoveeDevice, rgb: number) =>
    this.control(
      device,
      T.COLOR_SETTING,
      "colorRgb",
      clamp(Math.round(rgb), 0, MAX_RGB)
    );

  setColorTemperature = (device: GoveeDevice, kelvin: number) => {
    const { min, max } = device.colorTempRange;
    return this.control(
      device,
      T.COLOR_SETTING,
      "colorTemperatureK",
      clamp(Math.round(kelvin), min, max)
    );
  };

  setTemperature = (device: GoveeDevice, celsius: number) => {
    const { min, max } = device.temperatureRange;
    return this.control(device, T.TEMPERATURE_SETTING, "sliderTemperature", {
      temperature: clamp(Math.round(celsius), min, max),
      unit: "Celsius",
    });
  };

  setWorkMode = (device: GoveeDevice, instance: string, value: number) =>
    this.control(device, T.WORK_MODE, instance, { workMode: value });

  setScene = (device: GoveeDevice, instance: string, value: unknown) =>
    this.control(device, T.DYNAMIC_SCENE, instance, value);

  setGradient = (device: GoveeDevice, enabled: boolean) =>
    this.control(device, T.TOGGLE, "gradientToggle", enabled ? 1 : 0);

  setDreamview = (device: GoveeDevice, enabled: boolean) =>
    this.control(device, T.TOGGLE, "dreamViewToggle", enabled ? 1 : 0);

  setMusicMode = (device: GoveeDevice, mode: number, sensitivity: number) =>
    this.control(device, T.MUSIC_SETTING, "musicMode", {
      musicMode: mode,
      sensitivity,
      autoColor: 1,
    });

  private control = async (
    device: GoveeDevice,
    type: string,
    instance: string,
    value: unknown
  ): Promise<boolean> => {
    try {
      await this.request("POST", CONTROL_PATH, ControlResponseSchema, {
        requestId: crypto.randomUUID(),
        payload: {
          sku: device.sku,
          device: device.id,
          capability: { type, instance, value },
        },
      });
      log.debug("control.sent", { deviceId: device.id, instance });
      return true;
    } catch (error) {
      log.error("control.failed", error, { deviceId: device.id, instance });
      return false;
    }
  };

  private request = async <S extends z.ZodType>(
    method: "GET" | "POST",
    path: string,
    schema: S,
    body?: unknown
  ): Promise<z.infer<S>> => {
    if (!this.isConfigured()) {
      throw new GoveeApiError("API key not configured", "unauthorized");
    }

    await this.limiter.take();

    return Sentry.startSpan(
      { name: `${method} ${path}`, op: "http.client" },
      async span => {
        const payload = await this.send(method, path, body);
        span.setAttribute("http.response.status_code", payload.status);

        const envelope = EnvelopeSchema.safeParse(payload.json);
        const envelopeData = envelope.success ? envelope.data : {};

        if (payload.status !== 200) {
          throw GoveeApiError.fromCode(
            payload.status,
            `HTTP ${payload.status}: ${errorMessage(envelopeData)}`
          );
        }

        if (envelopeData.code !== undefined && envelopeData.code !== 200) {
          throw GoveeApiError.fromCode(
            envelopeData.code,
            `API error: ${errorMessage(envelopeData)}`
          );
        }

        return safeParse(payload.json, schema).fold(
          data => data,
          error => {
            throw new GoveeApiError(
              `Malformed response from ${path}`,
              "malformed",
              undefined,
              { cause: error }
            );
          }
        );
      }
    );
  };

  private send = async (
    method: "GET" | "POST",
    path: string,
    body?: unknown
  ): Promise<{ status: number; json: unknown }> => {
    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: {
          "Content-Type": "application/json",
          "Govee-API-Key": this.apiKey,
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeout),
        dispatcher: this.dispatcher,
      });

      const text = await response.text();
      let json: unknown;
      try {
        json = text ? JSON.parse(text) : undefined;
      } catch {
        json = undefined;
      }
      return { status: response.status, json };
    } catch (error) {
      throw new GoveeApiError(
        `Network error: ${error instanceof Error ? error.message : String(error)}`,
        "connection",
        undefined,
        { cause: error }
      );
    }
  };
}
