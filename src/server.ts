import { loadConfig } from "./config.js";
import { buildApp } from "./app.js";

const cfg = loadConfig();
const app = buildApp({ config: cfg });

const start = async () => {
  try {
    await app.listen({ port: cfg.port, host: "0.0.0.0" });
    app.log.info(
      { routes: cfg.routes, diarizationDomain: cfg.diarizationDomain },
      `listening on :${cfg.port}`
    );
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

const shutdown = () => {
  app.close().then(
    () => process.exit(0),
    (err: unknown) => {
      app.log.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  );
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

void start();
