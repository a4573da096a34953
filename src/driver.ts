import type { GoveeApi } from "./govee/client.ts";
import { IntegrationHost } from "./host/host.ts";
import {
  StatusCode,
  type CommandParams,
  type DeviceState,
} from "./host/types.ts";
import { createLogger } from "./logger.ts";
import type { ConfigStore } from "./registry/store.ts";
import { GoveeRemote } from "./remote/remote.ts";
import { SetupFlow } from "./setup/setup.ts";
import { sleep } from "./utility.ts";

const log = createLogger("driver");

export const MAX_CONNECT_ATTEMPTS = 5;
export const RETRY_DELAYS = [2000, 4000, 8000, 16_000] as const;

export interface DriverOptions {
  config: ConfigStore;
  client: GoveeApi;
  host?: IntegrationHost;
  /** Delays before the 2nd, 3rd, ... connection attempt */
  retryDelays?: readonly number[];
}

/**
 * Application context: owns the configuration, API client, host view and
 * the remote entity, and reacts to host lifecycle events.
 *
 * Entities are created from the persisted registry before the connection
 * is verified, so a host that subscribes early still finds them.
 */
export class IntegrationDriver {
  readonly config: ConfigStore;
  readonly client: GoveeApi;
  readonly host: IntegrationHost;
  readonly setup: SetupFlow;

  private readonly retryDelays: readonly number[];
  private remote?: GoveeRemote;
  private pollTimer?: NodeJS.Timeout;

  constructor({
    config,
    client,
    host = new IntegrationHost(),
    retryDelays = RETRY_DELAYS,
  }: DriverOptions) {
    this.config = config;
    this.client = client;
    this.host = host;
    this.retryDelays = retryDelays;
    this.setup = new SetupFlow(config, client, this.onSetupComplete);
  }

  get remoteEntity(): GoveeRemote | undefined {
    return this.remote;
  }

  /**
   * Pre-creates entities from the saved configuration and verifies the
   * connection in the background. Unconfigured integrations wait for setup
   * in the ERROR state.
   */
  start = (): void => {
    if (!this.config.isConfigured()) {
      log.warn("driver.not_configured");
      this.host.setDeviceState("ERROR");
      return;
    }

    if (!this.createEntities()) {
      this.host.setDeviceState("ERROR");
      return;
    }

    this.verifyInBackground();
  };

  stop = (): void => {
    this.stopPolling();
    log.info("driver.stopped");
  };

  /**
   * Builds the remote entity from the persisted registry. Does nothing once
   * an entity exists; returns whether one is available.
   */
  createEntities = (): boolean => {
    if (this.remote) {
      return true;
    }

    if (!this.applyApiKey()) {
      log.warn("entities.not_configured");
      return false;
    }

    const devices = this.config.devices;
    if (Object.keys(devices).length === 0) {
      log.warn("entities.no_devices");
      return false;
    }

    this.remote = new GoveeRemote(this.host, this.client, devices);
    this.host.replaceEntities([this.remote.entity]);
    log.info("entities.created", { devices: Object.keys(devices).length });
    return true;
  };

  /**
   * Tests the API connection up to `MAX_CONNECT_ATTEMPTS` times with
   * growing delays, ending in CONNECTED or ERROR.
   */
  verifyConnection = async (): Promise<boolean> => {
    if (!this.applyApiKey()) {
      this.host.setDeviceState("ERROR");
      return false;
    }

    this.host.setDeviceState("CONNECTING");

    for (let attempt = 1; attempt <= MAX_CONNECT_ATTEMPTS; attempt++) {
      if (attempt > 1) {
        await sleep(this.retryDelays[attempt - 2] ?? 0);
      }

      if (await this.client.testConnection()) {
        log.info("connection.verified", { attempt });
        this.host.setDeviceState("CONNECTED");
        this.startPolling();
        return true;
      }

      log.warn("connection.attempt_failed", {
        attempt,
        maxAttempts: MAX_CONNECT_ATTEMPTS,
      });
    }

    log.error("connection.failed", undefined, { attempts: MAX_CONNECT_ATTEMPTS });
    this.host.setDeviceState("ERROR");
    return false;
  };

  onConnect = async (): Promise<DeviceState> => {
    log.info("host.connected");

    if (!this.config.isConfigured()) {
      log.info("host.connected_unconfigured");
      return this.host.deviceState;
    }

    if (this.createEntities()) {
      const connected = await this.client.testConnection();
      this.host.setDeviceState(connected ? "CONNECTED" : "ERROR");
    }
    return this.host.deviceState;
  };

  onDisconnect = (): void => {
    log.info("host.disconnected");
  };

  /**
   * Subscribes the host to entities and pushes the remote's state when it
   * is among them. Returns the ids subscribed.
   */
  onSubscribe = async (entityIds: string[]): Promise<string[]> => {
    if (!this.remote) {
      log.warn("host.subscribed_before_entities");
      this.createEntities();
    }

    const subscribed = this.host.subscribe(entityIds);

    if (this.remote && this.config.isConfigured()) {
      if (!(await this.client.testConnection())) {
        log.error("host.subscribe_connection_failed");
        this.host.setDeviceState("ERROR");
        return subscribed;
      }
    }

    if (this.remote && subscribed.includes(this.remote.entity.id)) {
      this.remote.pushInitialState();
    }
    return subscribed;
  };

  onUnsubscribe = (entityIds: string[]): string[] => {
    const removed = this.host.unsubscribe(entityIds);
    log.info("host.unsubscribed", { entityIds: removed });
    return removed;
  };

  handleEntityCommand = async (
    entityId: string,
    commandId: string,
    params?: CommandParams
  ): Promise<StatusCode> => {
    const entity = this.host.getConfigured(entityId);
    if (!entity) {
      log.warn("command.unknown_entity", { entityId, commandId });
      return StatusCode.NOT_FOUND;
    }
    return entity.handleCommand(entityId, commandId, params);
  };

  /**
   * Rebuilds the entity from the freshly discovered registry
   */
  private onSetupComplete = async (): Promise<void> => {
    this.stopPolling();
    this.remote = undefined;

    if (!this.createEntities()) {
      this.host.clearEntities();
      this.host.setDeviceState("ERROR");
      return;
    }

    this.verifyInBackground();
  };

  private applyApiKey = (): boolean => {
    const apiKey = this.config.apiKey;
    if (!apiKey) {
      return false;
    }
    this.client.setApiKey(apiKey);
    return true;
  };

  private verifyInBackground = (): void => {
    this.verifyConnection().catch(error => {
      log.error("connection.verify_crashed", error);
      this.host.setDeviceState("ERROR");
    });
  };

  private startPolling = (): void => {
    const remote = this.remote;
    if (!remote || this.pollTimer) {
      return;
    }

    const interval = this.config.pollingInterval * 1000;
    this.pollTimer = setInterval(() => {
      remote.dispatcher
        .refreshStates()
        .catch(error => log.error("poll.failed", error));
    }, interval);
    this.pollTimer.unref();
    log.debug("poll.started", { interval });
  };

  private stopPolling = (): void => {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = undefined;
    }
  };
}
