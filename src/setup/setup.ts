/**
 * Setup and discovery
 *
 * Answers the host's setup wizard: checks stored or new credentials,
 * discovers devices, persists the registry and reports completion.
 * Errors are classified for the host and never retried here.
 */

import { match } from "ts-pattern";
import { GoveeApiError, type GoveeApi } from "../govee/client.ts";
import type { SetupAction, SetupError, SetupMessage } from "../host/schema.ts";
import { createLogger } from "../logger.ts";
import { buildRegistry } from "../registry/registry.ts";
import type { ConfigStore } from "../registry/store.ts";

const log = createLogger("setup");

export type SetupCompleteCallback = () => Promise<void>;

const complete = (): SetupAction => ({ kind: "complete" });
const failure = (error: SetupError): SetupAction => ({ kind: "error", error });

/**
 * Host setup error for a failed credential check or discovery
 */
export const classifySetupError = (error: unknown): SetupError =>
  error instanceof GoveeApiError
    ? match(error.kind)
        .with("unauthorized", (): SetupError => "AUTHORIZATION_ERROR")
        .with("rate_limited", (): SetupError => "OTHER")
        .otherwise((): SetupError => "CONNECTION_REFUSED")
    : "OTHER";

export class SetupFlow {
  private readonly config: ConfigStore;
  private readonly client: GoveeApi;
  private readonly onComplete: SetupCompleteCallback;

  constructor(
    config: ConfigStore,
    client: GoveeApi,
    onComplete: SetupCompleteCallback
  ) {
    this.config = config;
    this.client = client;
    this.onComplete = onComplete;
  }

  handle = (message: SetupMessage): Promise<SetupAction> => {
    log.info("setup.message", { kind: message.kind });

    return match<SetupMessage, Promise<SetupAction>>(message)
      .with({ kind: "driver_setup_request" }, this.handleSetupRequest)
      .with({ kind: "user_data_response" }, ({ inputValues }) =>
        this.handleApiKey(inputValues.api_key)
      )
      .with({ kind: "user_confirmation_response" }, async ({ confirm }) => {
        log.info("setup.confirmation", { confirm });
        return confirm ? complete() : failure("OTHER");
      })
      .with({ kind: "abort" }, async ({ error }) => {
        log.info("setup.aborted", { error });
        this.config.clear();
        return failure(error);
      })
      .exhaustive();
  };

  private handleSetupRequest = async ({
    reconfigure,
    setupData,
  }: Extract<SetupMessage, { kind: "driver_setup_request" }>): Promise<SetupAction> => {
    if (this.config.isConfigured() && !reconfigure) {
      if (await this.testStoredKey()) {
        log.info("setup.existing_config_valid");
        await this.onComplete();
        return complete();
      }
      log.warn("setup.existing_config_failed");
    }

    return this.handleApiKey(setupData.api_key);
  };

  private testStoredKey = async (): Promise<boolean> => {
    const apiKey = this.config.apiKey;
    if (!apiKey) {
      return false;
    }

    this.client.setApiKey(apiKey);
    return this.client.testConnection();
  };

  private handleApiKey = async (value?: string): Promise<SetupAction> => {
    const apiKey = value?.trim() ?? "";
    if (apiKey === "") {
      log.error("setup.missing_api_key");
      return failure("OTHER");
    }

    return this.discover(apiKey);
  };

  /**
   * Tests the key, lists devices and persists them with the key. An account
   * without devices still completes.
   */
  private discover = async (apiKey: string): Promise<SetupAction> => {
    this.client.setApiKey(apiKey);

    try {
      await this.client.verifyCredentials();

      const devices = await this.client.getDevices();
      const registry = buildRegistry(devices);

      devices.forEach(device =>
        log.info("setup.device", {
          deviceId: device.id,
          name: device.name,
          type: device.type,
          sku: device.sku,
        })
      );

      if (!this.config.update(apiKey, registry)) {
        return failure("OTHER");
      }

      log.info("setup.complete", { devices: devices.length });
      await this.onComplete();
      return complete();
    } catch (error) {
      const kind = classifySetupError(error);
      log.error("setup.failed", error, { kind });
      return failure(kind);
    }
  };
}
