import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigStore } from "../../../src/registry/store.ts";
import { createKettle, createLight } from "../../factories.ts";

describe("ConfigStore", () => {
  let directory: string;
  let file: string;

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), "govee-config-"));
    file = path.join(directory, "nested", "config.json");
  });

  afterEach(() => {
    fs.rmSync(directory, { recursive: true, force: true });
  });

  const write = (content: string) => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  };

  it("starts empty without a file", () => {
    const store = new ConfigStore(file);

    expect(store.isConfigured()).toBe(false);
    expect(store.apiKey).toBeNull();
    expect(store.devices).toEqual({});
    expect(store.pollingInterval).toBe(30);
  });

  it("persists key and registry in one pretty-printed write", () => {
    const light = createLight();
    const store = new ConfigStore(file);

    expect(store.update(" test-key ", { [light.id]: light.toRecord() })).toBe(true);

    const text = fs.readFileSync(file, "utf8");
    expect(text.endsWith("}\n")).toBe(true);
    expect(text.split("\n")[1]).toBe('  "api_key": "test-key",');

    const reloaded = new ConfigStore(file);
    expect(reloaded.isConfigured()).toBe(true);
    expect(reloaded.devices[light.id]).toEqual(light.toRecord());
  });

  it("round-trips every device flag", () => {
    const kettle = createKettle();
    const store = new ConfigStore(file);
    store.setApiKey("test-key");
    store.setDevices({ [kettle.id]: kettle.toRecord() });

    expect(new ConfigStore(file).devices).toEqual({
      [kettle.id]: kettle.toRecord(),
    });
  });

  it("fills defaults for records written by older releases", () => {
    write(
      JSON.stringify({
        api_key: "test-key",
        devices: { d1: { name: "Lamp", type: "lamp", supports_power: true } },
      })
    );

    const record = new ConfigStore(file).devices.d1;

    expect(record).toMatchObject({
      name: "Lamp",
      type: "sensor",
      sku: "",
      supports_power: true,
      supports_brightness: false,
      brightness_range: null,
      work_modes: [],
    });
  });

  it("treats malformed files as empty", () => {
    write("{ not json");
    expect(new ConfigStore(file).isConfigured()).toBe(false);

    write(JSON.stringify({ api_key: 42 }));
    expect(new ConfigStore(file).apiKey).toBeNull();
  });

  it("treats a blank key as unconfigured", () => {
    write(JSON.stringify({ api_key: "   " }));

    expect(new ConfigStore(file).isConfigured()).toBe(false);
  });

  it("clamps the polling interval", () => {
    const store = new ConfigStore(file);

    store.setPollingInterval(2);
    expect(store.pollingInterval).toBe(10);

    store.setPollingInterval(1000);
    expect(new ConfigStore(file).pollingInterval).toBe(300);

    write(JSON.stringify({ polling_interval: 5 }));
    expect(new ConfigStore(file).pollingInterval).toBe(10);
  });

  it("masks the key in diagnostics", () => {
    const store = new ConfigStore(file);
    store.setApiKey("test-secret");

    expect(store.getAllConfig().api_key).toBe("*******cret");
  });

  it("clears everything", () => {
    const store = new ConfigStore(file);
    store.update("test-key", { d1: createLight().toRecord() });

    expect(store.clear()).toBe(true);
    expect(new ConfigStore(file).isConfigured()).toBe(false);
    expect(new ConfigStore(file).devices).toEqual({});
  });

  it("reports write failures", () => {
    // a directory where the file should be
    fs.mkdirSync(file, { recursive: true });
    const store = new ConfigStore(file);

    expect(store.setApiKey("test-key")).toBe(false);
  });
});
