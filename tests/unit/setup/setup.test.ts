import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { GoveeApiError } from "../../../src/govee/client.ts";
import { ConfigStore } from "../../../src/registry/store.ts";
import { classifySetupError, SetupFlow } from "../../../src/setup/setup.ts";
import { createFakeApi, createKettle, createLight, type FakeApi } from "../../factories.ts";

describe("classifySetupError", () => {
  it("maps API error kinds to host setup errors", () => {
    expect(classifySetupError(GoveeApiError.fromCode(401, "nope"))).toBe(
      "AUTHORIZATION_ERROR"
    );
    expect(classifySetupError(GoveeApiError.fromCode(429, "slow down"))).toBe("OTHER");
    expect(classifySetupError(GoveeApiError.fromCode(500, "down"))).toBe(
      "CONNECTION_REFUSED"
    );
    expect(classifySetupError(new GoveeApiError("offline", "connection"))).toBe(
      "CONNECTION_REFUSED"
    );
    expect(classifySetupError(new TypeError("bug"))).toBe("OTHER");
  });
});

describe("SetupFlow", () => {
  let directory: string;
  let config: ConfigStore;
  let api: FakeApi;
  let onComplete: Mock<() => Promise<void>>;
  let flow: SetupFlow;

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), "govee-setup-"));
    config = new ConfigStore(path.join(directory, "config.json"));
    api = createFakeApi();
    onComplete = vi.fn<() => Promise<void>>(async () => {});
    flow = new SetupFlow(config, api, onComplete);
  });

  afterEach(() => {
    fs.rmSync(directory, { recursive: true, force: true });
  });

  const request = (apiKey?: string, reconfigure = false) =>
    flow.handle({
      kind: "driver_setup_request",
      reconfigure,
      setupData: apiKey === undefined ? {} : { api_key: apiKey },
    });

  it("discovers and persists devices for a new key", async () => {
    const light = createLight();
    const kettle = createKettle();
    api.getDevices.mockResolvedValue([light, kettle]);

    expect(await request("  test-key  ")).toEqual({ kind: "complete" });

    expect(api.setApiKey).toHaveBeenCalledWith("test-key");
    expect(api.verifyCredentials).toHaveBeenCalled();
    expect(config.apiKey).toBe("test-key");
    expect(Object.keys(config.devices)).toEqual([light.id, kettle.id]);
    expect(onComplete).toHaveBeenCalledTimes(1);
  });

  it("completes with an empty registry when the account has no devices", async () => {
    expect(await request("test-key")).toEqual({ kind: "complete" });

    expect(config.isConfigured()).toBe(true);
    expect(config.devices).toEqual({});
  });

  it("fails without a key", async () => {
    expect(await request()).toEqual({ kind: "error", error: "OTHER" });
    expect(await request("   ")).toEqual({ kind: "error", error: "OTHER" });
    expect(api.verifyCredentials).not.toHaveBeenCalled();
  });

  it("reports a refused key as an authorization error", async () => {
    api.verifyCredentials.mockRejectedValue(GoveeApiError.fromCode(401, "HTTP 401"));

    expect(await request("test-key")).toEqual({
      kind: "error",
      error: "AUTHORIZATION_ERROR",
    });
    expect(config.isConfigured()).toBe(false);
    expect(onComplete).not.toHaveBeenCalled();
  });

  it("reports a failed listing as refused connection", async () => {
    api.getDevices.mockRejectedValue(new GoveeApiError("offline", "connection"));

    expect(await request("test-key")).toEqual({
      kind: "error",
      error: "CONNECTION_REFUSED",
    });
  });

  it("reuses a stored key that still works", async () => {
    config.update("test-key", { d1: createLight().toRecord() });

    expect(await request()).toEqual({ kind: "complete" });

    expect(api.setApiKey).toHaveBeenCalledWith("test-key");
    expect(api.testConnection).toHaveBeenCalled();
    expect(api.getDevices).not.toHaveBeenCalled();
    expect(onComplete).toHaveBeenCalledTimes(1);
  });

  it("falls through to the submitted key when the stored one fails", async () => {
    config.update("old-key", {});
    api.testConnection.mockResolvedValue(false);

    expect(await request("test-key")).toEqual({ kind: "complete" });
    expect(config.apiKey).toBe("test-key");
  });

  it("rediscovers when reconfiguring", async () => {
    config.update("test-key", {});

    await request("test-key", true);

    expect(api.testConnection).not.toHaveBeenCalled();
    expect(api.getDevices).toHaveBeenCalled();
  });

  it("accepts the key from a user data response", async () => {
    expect(
      await flow.handle({ kind: "user_data_response", inputValues: { api_key: "test-key" } })
    ).toEqual({ kind: "complete" });
  });

  it("answers confirmations", async () => {
    expect(await flow.handle({ kind: "user_confirmation_response", confirm: true })).toEqual({
      kind: "complete",
    });
    expect(await flow.handle({ kind: "user_confirmation_response", confirm: false })).toEqual({
      kind: "error",
      error: "OTHER",
    });
  });

  it("clears the configuration on abort", async () => {
    config.update("test-key", { d1: createLight().toRecord() });

    expect(await flow.handle({ kind: "abort", error: "TIMEOUT" })).toEqual({
      kind: "error",
      error: "TIMEOUT",
    });
    expect(config.isConfigured()).toBe(false);
    expect(config.devices).toEqual({});
  });
});
