import { match, P } from "ts-pattern";
import type { GoveeApi } from "../govee/client.ts";
import type { IntegrationHost } from "../host/host.ts";
import {
  StatusCode,
  type CommandParams,
  type RemoteEntity,
} from "../host/types.ts";
import { createLogger } from "../logger.ts";
import type { DeviceRegistry } from "../registry/schema.ts";
import { createButtonMapping } from "./buttons.ts";
import { generateCommands } from "./commands.ts";
import { CommandDispatcher } from "./dispatcher.ts";
import type { Throttle } from "./throttle.ts";
import { createUiPages } from "./ui.ts";

const log = createLogger("remote");

export const REMOTE_ENTITY_ID = "govee_remote_main";

/**
 * The single remote entity exposing every discovered device: simple
 * commands, UI pages and button mapping are generated from the registry
 * when the entity is built.
 */
export class GoveeRemote {
  readonly entity: RemoteEntity;
  readonly dispatcher: CommandDispatcher;
  private readonly host: IntegrationHost;
  private readonly client: GoveeApi;

  constructor(
    host: IntegrationHost,
    client: GoveeApi,
    registry: DeviceRegistry,
    throttle?: Throttle
  ) {
    this.host = host;
    this.client = client;
    this.dispatcher = new CommandDispatcher(client, registry, throttle);

    this.entity = {
      id: REMOTE_ENTITY_ID,
      name: { en: "Govee Remote" },
      features: ["on_off", "send_cmd"],
      attributes: { state: "ON" },
      simpleCommands: generateCommands(registry),
      buttonMapping: createButtonMapping(registry),
      uiPages: createUiPages(registry),
      handleCommand: this.handleCommand,
    };

    log.info("remote.created", {
      devices: Object.keys(registry).length,
      commands: this.entity.simpleCommands.length,
      pages: this.entity.uiPages.length,
    });
  }

  handleCommand = async (
    entityId: string,
    commandId: string,
    params?: CommandParams
  ): Promise<StatusCode> => {
    log.info("remote.command", { entityId, commandId });

    if (!this.client.isConfigured()) {
      return StatusCode.SERVICE_UNAVAILABLE;
    }

    try {
      return await match(commandId)
        .with("on", () => this.setState("ON"))
        .with("off", () => this.setState("OFF"))
        .with("send_cmd", () => this.sendCommand(params))
        .otherwise(async () => StatusCode.NOT_IMPLEMENTED);
    } catch (error) {
      log.error("remote.command_failed", error, { entityId, commandId });
      return StatusCode.SERVER_ERROR;
    }
  };

  /**
   * Publishes the entity's state once the host has subscribed to it
   */
  pushInitialState = (): boolean => {
    if (!this.host.isConfigured(this.entity.id)) {
      log.warn("remote.not_subscribed", { entityId: this.entity.id });
      return false;
    }
    return this.host.updateAttributes(this.entity.id, { state: "ON" });
  };

  private setState = async (state: "ON" | "OFF"): Promise<StatusCode> => {
    this.entity.attributes = { ...this.entity.attributes, state };
    this.host.updateAttributes(this.entity.id, { state });
    return StatusCode.OK;
  };

  private sendCommand = async (params?: CommandParams): Promise<StatusCode> =>
    match(params?.command)
      .with(P.string.minLength(1), async command =>
        (await this.dispatcher.execute(command))
          ? StatusCode.OK
          : StatusCode.SERVER_ERROR
      )
      .otherwise(async () => StatusCode.BAD_REQUEST);
}
