import "dotenv/config";
import { buildApp } from "./app.js";
import { getBotConfigFromEnv } from "./config.js";

const start = async () => {
  try {
    const config = getBotConfigFromEnv();
    const closeAndExit = (exitCode: number) => {
      app.close().then(
        () => process.exit(exitCode),
        (error: unknown) => {
          app.log.error({ err: error }, "shutdown failed");
          process.exit(1);
        }
      );
    };

    const app = await buildApp({ config, onFatal: () => closeAndExit(1) });

    const shutdown = (signal: NodeJS.Signals) => {
      app.log.info({ signal }, "shutting down");
      closeAndExit(0);
    };

    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);

    await app.listen({ port: config.http.port, host: config.http.host });
  } catch (error) {
    console.error(error);
    process.exit(1);
  }
};

void start();
