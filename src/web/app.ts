import * as Sentry from "@sentry/node";
import { logger } from "@tinyhttp/logger";
import debug from "debug";
import type { Request, Response } from "express";
import express from "express";
import helmet from "helmet";
import type { IncomingMessage, ServerResponse } from "node:http";
import type { IntegrationDriver } from "../driver.ts";
import {
  CommandRequestSchema,
  SetupMessageSchema,
  SubscribeRequestSchema,
} from "../host/schema.ts";
import type {
  DeviceState,
  RemoteAttributes,
  RemoteEntity,
} from "../host/types.ts";
import { createLogger } from "../logger.ts";
import { safeParse } from "../utility.ts";

const log = createLogger("web");

const MAX_QUEUED_EVENTS = 100;

/**
 * Host notification waiting for the host to collect it from `/events`
 */
export type BridgeEvent =
  | { type: "device_state"; state: DeviceState }
  | { type: "entity_change"; entityId: string; attributes: RemoteAttributes }
  | { type: "entities_subscribed"; entityIds: string[] };

/**
 * Entity as sent over the wire, without its command handler
 */
const describeEntity = ({
  id,
  name,
  features,
  attributes,
  simpleCommands,
  buttonMapping,
  uiPages,
}: RemoteEntity) => ({
  id,
  name,
  features,
  attributes,
  simpleCommands,
  buttonMapping,
  uiPages,
});

const badRequest = (response: Response, error: Error): void => {
  log.warn("request.invalid", { message: error.message });
  response.status(400).json({ error: "invalid_request" });
};

/**
 * JSON bridge through which a remote-control host drives the integration:
 * setup messages, connection events, entity subscription and commands.
 */
export class WebApp {
  readonly app: express.Application;

  private readonly driver: IntegrationDriver;
  private events: BridgeEvent[] = [];

  constructor(driver: IntegrationDriver) {
    this.driver = driver;

    driver.host
      .on("deviceStateChanged", state => this.enqueue({ type: "device_state", state }))
      .on("entityAttributesChanged", (entityId, attributes) =>
        this.enqueue({ type: "entity_change", entityId, attributes })
      )
      .on("entitiesSubscribed", entityIds =>
        this.enqueue({ type: "entities_subscribed", entityIds })
      );

    const logging = logger({
      ignore: ["/health"],
      output: { callback: debug("govee:request"), color: false },
    });

    this.app = express()
      .disable("x-powered-by")
      .use(logging)
      .use(express.json())
      .use(helmet())
      .get("/health", (_, res) =>
        res.json({ status: "ok", deviceState: this.driver.host.deviceState })
      )
      .get("/entities", this.handleEntities)
      .get("/events", this.handleEvents)
      .post("/setup", this.handleSetup)
      .post("/connect", this.handleConnect)
      .post("/disconnect", this.handleDisconnect)
      .post("/subscribe", this.handleSubscribe)
      .post("/unsubscribe", this.handleUnsubscribe)
      .post("/entities/:entityId/command", this.handleCommand);

    Sentry.setupExpressErrorHandler(this.app);
  }

  private handleEntities = (_: Request, res: Response) => {
    const { host } = this.driver;
    res.json({
      deviceState: host.deviceState,
      available: host.availableEntities().map(describeEntity),
      configured: host.configuredEntities().map(({ id }) => id),
    });
  };

  /**
   * Hands out queued notifications, oldest first, and empties the queue
   */
  private handleEvents = (_: Request, res: Response) => {
    const events = this.events;
    this.events = [];
    res.json({ events });
  };

  private enqueue = (event: BridgeEvent): void => {
    this.events.push(event);
    if (this.events.length > MAX_QUEUED_EVENTS) {
      const dropped = this.events.splice(0, this.events.length - MAX_QUEUED_EVENTS);
      log.warn("events.dropped", { count: dropped.length });
    }
  };

  private handleSetup = (req: Request, res: Response): Promise<void> =>
    safeParse(req.body, SetupMessageSchema).fold(
      async message => {
        res.json(await this.driver.setup.handle(message));
      },
      async error => badRequest(res, error)
    );

  private handleConnect = async (_: Request, res: Response): Promise<void> => {
    res.json({ deviceState: await this.driver.onConnect() });
  };

  private handleDisconnect = (_: Request, res: Response): void => {
    this.driver.onDisconnect();
    res.json({ deviceState: this.driver.host.deviceState });
  };

  private handleSubscribe = (req: Request, res: Response): Promise<void> =>
    safeParse(req.body ?? {}, SubscribeRequestSchema).fold(
      async ({ entityIds }) => {
        res.json({ subscribed: await this.driver.onSubscribe(entityIds) });
      },
      async error => badRequest(res, error)
    );

  private handleUnsubscribe = (req: Request, res: Response): void =>
    safeParse(req.body ?? {}, SubscribeRequestSchema).fold(
      ({ entityIds }) => {
        res.json({ unsubscribed: this.driver.onUnsubscribe(entityIds) });
      },
      error => badRequest(res, error)
    );

  private handleCommand = (
    req: Request<{ entityId: string }>,
    res: Response
  ): Promise<void> =>
    safeParse(req.body, CommandRequestSchema).fold(
      async ({ command, params }) => {
        const code = await this.driver.handleEntityCommand(
          req.params.entityId,
          command,
          params
        );
        res.status(code).json({ code });
      },
      async error => badRequest(res, error)
    );

  handleRequest = (request: IncomingMessage, response: ServerResponse) =>
    this.app(request, response);
}
