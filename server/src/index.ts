import "dotenv/config";
import { buildApp } from "./app.js";
import { ConfigError, DATABASE_URL, HOST, PORT } from "./config.js";
import { createSubscriberStore } from "./db/index.js";
import { createLogger } from "./logger.js";
import { sendWelcome, type SendWelcome } from "./services/dispatcher.js";
import {
  createMailSetup,
  loadLatestArticles,
} from "./services/newsletterRuntime.js";

async function main() {
  const log = createLogger("server");
  const store = await createSubscriberStore(DATABASE_URL, log);

  // Welcome mail is optional for the web server; subscribing works without it.
  let welcome: SendWelcome | undefined;
  try {
    const { mailer, newsletter } = createMailSetup();
    welcome = (email) =>
      sendWelcome(email, {
        store,
        mailer,
        newsletter,
        log,
        loadArticles: () => loadLatestArticles(log),
      });
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    log.warn(`${err.message} Welcome emails are disabled.`);
  }

  const app = await buildApp({ store, sendWelcome: welcome });
  app.addHook("onClose", async () => {
    await store.close();
  });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, "Shutting down");
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, "Error during shutdown");
          process.exit(1);
        },
      );
    });
  }

  await app.listen({ port: PORT, host: HOST });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
