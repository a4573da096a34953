import "./instrument.ts";

import http from "node:http";
import appConfig from "./config.ts";
import { IntegrationDriver } from "./driver.ts";
import { GoveeClient } from "./govee/client.ts";
import { createLogger } from "./logger.ts";
import { ConfigStore } from "./registry/store.ts";
import { WebApp } from "./web/app.ts";

const log = createLogger("main");

const config = new ConfigStore(appConfig.configFile);

const client = new GoveeClient({ apiKey: config.apiKey ?? "" });

const driver = new IntegrationDriver({ config, client });
const webApp = new WebApp(driver);

const server = http.createServer(webApp.handleRequest);

server.listen(appConfig.httpPort, () => {
  log.info("server.started", {
    port: appConfig.httpPort,
    configFile: appConfig.configFile,
    env: appConfig.env,
  });
  driver.start();
});

const shutdown = (signal: NodeJS.Signals) => {
  log.info("server.shutdown", { signal });
  driver.stop();
  server.close(error => {
    if (error) {
      log.error("server.close_failed", error);
      process.exit(1);
    }
    process.exit(0);
  });
};

process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);
