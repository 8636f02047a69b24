import "dotenv/config";
import { DATABASE_URL } from "../config.js";
import { createSubscriberStore } from "../db/index.js";
import { createLogger } from "../logger.js";
import {
  createMailSetup,
  loadLatestArticles,
} from "../services/newsletterRuntime.js";
import { runNewsletterJob } from "./newsletterJob.js";

const log = createLogger("newsletter");

runNewsletterJob(process.argv.slice(2), {
  log,
  mailSetup: () => createMailSetup(),
  openStore: () => createSubscriberStore(DATABASE_URL, log),
  loadArticles: () => loadLatestArticles(log),
})
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    log.error({ err }, "Newsletter job failed");
    process.exit(1);
  });
