import "dotenv/config";
import { DATABASE_URL } from "../config.js";
import { createSubscriberStore } from "../db/index.js";
import { createLogger } from "../logger.js";
import { runSubscriberCommand } from "./subscriberCommands.js";

const log = createLogger("subscribers", "warn");

runSubscriberCommand(process.argv.slice(2), {
  openStore: () => createSubscriberStore(DATABASE_URL, log),
})
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  });
