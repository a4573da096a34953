import fs from "node:fs";
import path from "node:path";
import { createLogger } from "../logger.ts";
import { clamp, cloak, Result, safeParse } from "../utility.ts";
import {
  ConfigFileSchema,
  DEFAULT_POLLING_INTERVAL,
  MAX_POLLING_INTERVAL,
  MIN_POLLING_INTERVAL,
  type ConfigFile,
  type DeviceRegistry,
} from "./schema.ts";

const log = createLogger("config");

const emptyConfig = (): ConfigFile => ({
  api_key: null,
  devices: {},
  polling_interval: DEFAULT_POLLING_INTERVAL,
});

/**
 * Persistent integration settings: api key, device registry and polling
 * interval, kept in one JSON file. Every mutation is written through.
 */
export class ConfigStore {
  private readonly filePath: string;
  private data: ConfigFile = emptyConfig();

  constructor(filePath: string) {
    this.filePath = filePath;
    this.load();
  }

  /**
   * Re-reads the file. A missing file is an empty configuration; an
   * unreadable or invalid one is logged and treated the same way.
   */
  load = (): void => {
    if (!fs.existsSync(this.filePath)) {
      log.debug("config.not_found", { path: this.filePath });
      this.data = emptyConfig();
      return;
    }

    this.data = Result.try(() => fs.readFileSync(this.filePath, "utf8"))
      .flatMap(text => Result.try((): unknown => JSON.parse(text)))
      .flatMap(json => safeParse(json, ConfigFileSchema))
      .fold(
        config => {
          log.debug("config.loaded", {
            devices: Object.keys(config.devices).length,
          });
          return config;
        },
        error => {
          log.error("config.load_failed", error, { path: this.filePath });
          return emptyConfig();
        }
      );
  };

  get apiKey(): string | null {
    return this.data.api_key;
  }

  get devices(): DeviceRegistry {
    return this.data.devices;
  }

  get pollingInterval(): number {
    return clamp(
      this.data.polling_interval,
      MIN_POLLING_INTERVAL,
      MAX_POLLING_INTERVAL
    );
  }

  isConfigured = (): boolean => (this.data.api_key ?? "").trim() !== "";

  setApiKey = (apiKey: string): boolean => {
    this.data.api_key = apiKey.trim();
    return this.save();
  };

  setDevices = (devices: DeviceRegistry): boolean => {
    this.data.devices = devices;
    return this.save();
  };

  setPollingInterval = (seconds: number): boolean => {
    this.data.polling_interval = clamp(
      Math.round(seconds),
      MIN_POLLING_INTERVAL,
      MAX_POLLING_INTERVAL
    );
    return this.save();
  };

  /**
   * Stores a discovery result (key and registry) with a single write
   */
  update = (apiKey: string, devices: DeviceRegistry): boolean => {
    this.data = { ...this.data, api_key: apiKey.trim(), devices };
    return this.save();
  };

  clear = (): boolean => {
    this.data = emptyConfig();
    return this.save();
  };

  /**
   * Current configuration with the api key masked, for diagnostics
   */
  getAllConfig = (): ConfigFile => ({
    ...this.data,
    api_key: this.data.api_key === null ? null : cloak(this.data.api_key),
  });

  save = (): boolean =>
    Result.try(() => {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(
        this.filePath,
        JSON.stringify(this.data, null, 2) + "\n",
        "utf8"
      );
    }).fold(
      () => {
        log.debug("config.saved", { path: this.filePath });
        return true;
      },
      error => {
        log.error("config.save_failed", error, { path: this.filePath });
        return false;
      }
    );
}
