import { buildApp } from "./server.js";
import { loadRuntimeConfig } from "./infra/config.js";

const config = loadRuntimeConfig();
const app = buildApp(config);

app
  .listen({ port: config.port, host: config.host })
  .then((address) => {
    app.log.info({ address, clockSource: config.clockSource }, "clock service listening");
  })
  .catch((error: unknown) => {
    app.log.fatal({ err: error }, "clock service failed to start");
    process.exit(1);
  });
