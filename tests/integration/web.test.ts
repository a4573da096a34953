/**
 * Integration tests for the host bridge endpoints
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { IntegrationDriver } from "../../src/driver.ts";
import { ConfigStore } from "../../src/registry/store.ts";
import { REMOTE_ENTITY_ID } from "../../src/remote/remote.ts";
import { WebApp } from "../../src/web/app.ts";
import { createFakeApi, createLight, type FakeApi } from "../factories.ts";

describe("WebApp", () => {
  let directory: string;
  let config: ConfigStore;
  let api: FakeApi;
  let driver: IntegrationDriver;
  let webApp: WebApp;

  const light = createLight();

  const configure = () => {
    config.update("test-key", { [light.id]: light.toRecord() });
    driver.createEntities();
  };

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), "govee-web-"));
    config = new ConfigStore(path.join(directory, "config.json"));
    api = createFakeApi();
    driver = new IntegrationDriver({ config, client: api, retryDelays: [0, 0, 0, 0] });
    webApp = new WebApp(driver);
  });

  afterEach(() => {
    driver.stop();
    fs.rmSync(directory, { recursive: true, force: true });
  });

  describe("GET /health", () => {
    it("reports the device state", async () => {
      const response = await request(webApp.app).get("/health").expect(200);

      expect(response.body).toEqual({ status: "ok", deviceState: "DISCONNECTED" });
    });
  });

  describe("POST /setup", () => {
    it("discovers devices and exposes the remote", async () => {
      api.getDevices.mockResolvedValue([light]);

      const response = await request(webApp.app)
        .post("/setup")
        .send({ kind: "driver_setup_request", setupData: { api_key: "test-key" } })
        .expect(200);

      expect(response.body).toEqual({ kind: "complete" });
      expect(config.apiKey).toBe("test-key");

      const entities = await request(webApp.app).get("/entities").expect(200);
      expect(entities.body.available).toHaveLength(1);
      expect(entities.body.available[0]).toMatchObject({
        id: REMOTE_ENTITY_ID,
        name: { en: "Govee Remote" },
        features: ["on_off", "send_cmd"],
      });
      expect(entities.body.available[0]).not.toHaveProperty("handleCommand");
      expect(entities.body.configured).toEqual([]);
    });

    it("reports a missing key", async () => {
      const response = await request(webApp.app)
        .post("/setup")
        .send({ kind: "user_data_response", inputValues: {} })
        .expect(200);

      expect(response.body).toEqual({ kind: "error", error: "OTHER" });
    });

    it("rejects unknown messages", async () => {
      const response = await request(webApp.app)
        .post("/setup")
        .send({ kind: "reboot" })
        .expect(400);

      expect(response.body).toEqual({ error: "invalid_request" });
    });
  });

  describe("POST /connect", () => {
    it("verifies the connection of a configured integration", async () => {
      configure();

      const response = await request(webApp.app).post("/connect").expect(200);

      expect(response.body).toEqual({ deviceState: "CONNECTED" });
    });
  });

  describe("subscriptions", () => {
    it("subscribes to every entity when none are named", async () => {
      configure();

      const response = await request(webApp.app).post("/subscribe").send({}).expect(200);

      expect(response.body).toEqual({ subscribed: [REMOTE_ENTITY_ID] });
    });

    it("unsubscribes named entities", async () => {
      configure();
      await request(webApp.app).post("/subscribe").send({}).expect(200);

      const response = await request(webApp.app)
        .post("/unsubscribe")
        .send({ entityIds: [REMOTE_ENTITY_ID, "ghost"] })
        .expect(200);

      expect(response.body).toEqual({ unsubscribed: [REMOTE_ENTITY_ID] });
    });

    it("rejects malformed ids", async () => {
      await request(webApp.app)
        .post("/subscribe")
        .send({ entityIds: "all" })
        .expect(400);
    });
  });

  describe("GET /events", () => {
    it("hands out host notifications once", async () => {
      configure();
      await request(webApp.app).post("/subscribe").send({}).expect(200);

      const first = await request(webApp.app).get("/events").expect(200);
      const second = await request(webApp.app).get("/events").expect(200);

      expect(first.body).toEqual({
        events: [
          { type: "entities_subscribed", entityIds: [REMOTE_ENTITY_ID] },
          {
            type: "entity_change",
            entityId: REMOTE_ENTITY_ID,
            attributes: { state: "ON" },
          },
        ],
      });
      expect(second.body).toEqual({ events: [] });
    });

    it("reports connection state changes", async () => {
      configure();
      await request(webApp.app).post("/connect").expect(200);

      const response = await request(webApp.app).get("/events").expect(200);

      expect(response.body).toEqual({
        events: [{ type: "device_state", state: "CONNECTED" }],
      });
    });

    it("keeps only the newest notifications", async () => {
      configure();
      await request(webApp.app).post("/subscribe").send({}).expect(200);
      await request(webApp.app).get("/events").expect(200);

      for (let i = 0; i < 60; i++) {
        await request(webApp.app)
          .post(`/entities/${REMOTE_ENTITY_ID}/command`)
          .send({ command: i % 2 === 0 ? "off" : "on" })
          .expect(200);
      }
      for (let i = 0; i < 50; i++) {
        await request(webApp.app)
          .post(`/entities/${REMOTE_ENTITY_ID}/command`)
          .send({ command: "off" })
          .expect(200);
      }

      const response = await request(webApp.app).get("/events").expect(200);

      expect(response.body.events).toHaveLength(100);
      expect(response.body.events[0]).toEqual({
        type: "entity_change",
        entityId: REMOTE_ENTITY_ID,
        attributes: { state: "OFF" },
      });
    });
  });

  describe("POST /entities/:entityId/command", () => {
    beforeEach(async () => {
      configure();
      await request(webApp.app).post("/subscribe").send({}).expect(200);
    });

    it("executes simple commands", async () => {
      const response = await request(webApp.app)
        .post(`/entities/${REMOTE_ENTITY_ID}/command`)
        .send({ command: "send_cmd", params: { command: "DESK_LAMP_ON" } })
        .expect(200);

      expect(response.body).toEqual({ code: 200 });
      expect(api.turnOn).toHaveBeenCalledTimes(1);
    });

    it("answers 400 when the simple command is missing", async () => {
      const response = await request(webApp.app)
        .post(`/entities/${REMOTE_ENTITY_ID}/command`)
        .send({ command: "send_cmd" })
        .expect(400);

      expect(response.body).toEqual({ code: 400 });
    });

    it("answers 501 for unsupported entity commands", async () => {
      await request(webApp.app)
        .post(`/entities/${REMOTE_ENTITY_ID}/command`)
        .send({ command: "channel_up" })
        .expect(501);
    });

    it("answers 404 for unknown entities", async () => {
      const response = await request(webApp.app)
        .post("/entities/ghost/command")
        .send({ command: "on" })
        .expect(404);

      expect(response.body).toEqual({ code: 404 });
    });

    it("rejects a body without a command", async () => {
      const response = await request(webApp.app)
        .post(`/entities/${REMOTE_ENTITY_ID}/command`)
        .send({ params: {} })
        .expect(400);

      expect(response.body).toEqual({ error: "invalid_request" });
    });
  });
});
