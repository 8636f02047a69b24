import { subscribeBodySchema } from "@newsdesk/shared";
import {
  ALREADY_SUBSCRIBED_MESSAGE,
  RESUBSCRIBE_SUCCESS_MESSAGE,
  type SubscriberStore,
} from "../db/subscribers.js";
import { readSubscriberFile } from "../db/subscriberFile.js";

export const SUBSCRIBERS_USAGE = `Usage: subscribers <command> [args]

Commands:
  subscribe <email>     Add or reactivate a subscriber
  unsubscribe <email>   Deactivate a subscriber
  list                  List active subscribers
  import <file>         Add every address in a subscriber list file
  process               Process UNSUBSCRIBE replies (not implemented)`;

export const PROCESS_NOT_IMPLEMENTED =
  "Automatic processing of UNSUBSCRIBE replies is not implemented. Use `unsubscribe <email>` for each reply.";

export interface SubscriberCommandDeps {
  /** Opened only for commands that need it; closed before returning. */
  openStore: () => Promise<SubscriberStore>;
  out?: (line: string) => void;
  err?: (line: string) => void;
  readList?: (path: string) => Promise<string[]>;
}

function normalizeEmail(raw: string): string | null {
  const parsed = subscribeBodySchema.safeParse({ email: raw });
  return parsed.success ? parsed.data.email : null;
}

interface ImportTally {
  added: number;
  reactivated: number;
  existing: number;
  failed: number;
}

async function importList(
  store: SubscriberStore,
  emails: string[],
  err: (line: string) => void,
): Promise<ImportTally> {
  const tally: ImportTally = { added: 0, reactivated: 0, existing: 0, failed: 0 };
  for (const raw of emails) {
    const email = normalizeEmail(raw);
    if (!email) {
      err(`Skipping invalid address: ${raw}`);
      tally.failed++;
      continue;
    }
    const result = await store.add(email);
    if (!result.success) {
      err(`${email}: ${result.message}`);
      tally.failed++;
    } else if (result.isNew) {
      tally.added++;
    } else if (result.message === RESUBSCRIBE_SUCCESS_MESSAGE) {
      tally.reactivated++;
    } else if (result.message === ALREADY_SUBSCRIBED_MESSAGE) {
      tally.existing++;
    }
  }
  return tally;
}

/**
 * Subscriber management commands. Resolves the process exit code:
 * 0 on success, 1 on usage errors and failed operations.
 */
export async function runSubscriberCommand(
  argv: string[],
  deps: SubscriberCommandDeps,
): Promise<number> {
  const out = deps.out ?? console.log;
  const err = deps.err ?? console.error;
  const [rawCommand, arg] = argv;
  const command = rawCommand?.trim().toLowerCase();

  if (!command) {
    out(SUBSCRIBERS_USAGE);
    return 1;
  }

  switch (command) {
    case "process":
      out(PROCESS_NOT_IMPLEMENTED);
      return 0;

    case "subscribe":
    case "unsubscribe": {
      if (!arg) {
        err(`Missing email for ${command}`);
        out(SUBSCRIBERS_USAGE);
        return 1;
      }
      const email = normalizeEmail(arg);
      if (!email) {
        err(`Invalid email address: ${arg}`);
        return 1;
      }
      const store = await deps.openStore();
      try {
        const result =
          command === "subscribe" ? await store.add(email) : await store.remove(email);
        (result.success ? out : err)(result.message);
        return result.success ? 0 : 1;
      } finally {
        await store.close();
      }
    }

    case "list": {
      const store = await deps.openStore();
      try {
        const subscribers = await store.listActive();
        if (subscribers.length === 0) {
          out("No active subscribers.");
          return 0;
        }
        out(`Active subscribers (${subscribers.length}):`);
        for (const s of subscribers) out(`  - ${s.email}`);
        return 0;
      } finally {
        await store.close();
      }
    }

    case "import": {
      if (!arg) {
        err("Missing file for import");
        out(SUBSCRIBERS_USAGE);
        return 1;
      }
      let emails: string[];
      try {
        emails = await (deps.readList ?? readSubscriberFile)(arg);
      } catch (e) {
        err(`Could not read ${arg}: ${e instanceof Error ? e.message : String(e)}`);
        return 1;
      }
      const store = await deps.openStore();
      try {
        const t = await importList(store, emails, err);
        out(
          `Imported ${emails.length} addresses: ${t.added} new, ${t.reactivated} reactivated, ${t.existing} already subscribed, ${t.failed} failed`,
        );
        return t.failed > 0 ? 1 : 0;
      } finally {
        await store.close();
      }
    }

    default:
      err(`Unknown command: ${command}`);
      out(SUBSCRIBERS_USAGE);
      return 1;
  }
}
