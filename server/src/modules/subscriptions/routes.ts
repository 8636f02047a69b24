import type { FastifyInstance, FastifyReply } from "fastify";
import {
  subscribeBodySchema,
  unsubscribeEmailBodySchema,
  unsubscribeFormSchema,
  unsubscribeQuerySchema,
  unsubscribeTokenSchema,
} from "@newsdesk/shared";
import {
  INVALID_TOKEN_MESSAGE,
  NOT_FOUND_MESSAGE,
  type SubscriberStore,
} from "../../db/subscribers.js";
import type { SendWelcome } from "../../services/dispatcher.js";
import {
  renderConfirmUnsubscribePage,
  renderIndexPage,
  renderSuccessPage,
  type Flash,
} from "./views.js";

const HTML = "text/html; charset=utf-8";
const GENERIC_ERROR = "An error occurred. Please try again later.";
const INVALID_EMAIL = "Please enter a valid email address.";

export interface SubscriptionRoutesOptions {
  store: SubscriberStore;
  appName: string;
  /** Called without awaiting for first-time subscribers. Omit to disable welcome mail. */
  sendWelcome?: SendWelcome;
}

function firstToken(...candidates: Array<string | undefined>): string | undefined {
  for (const candidate of candidates) {
    const trimmed = candidate?.trim();
    if (trimmed) return trimmed;
  }
  return undefined;
}

export async function subscriptionRoutes(
  app: FastifyInstance,
  opts: SubscriptionRoutesOptions,
) {
  const { store, appName, sendWelcome } = opts;

  async function sendIndex(reply: FastifyReply, status: number, flash?: Flash) {
    const subscriberCount = await store.countActive();
    return reply
      .status(status)
      .header("Content-Type", HTML)
      .send(renderIndexPage({ appName, subscriberCount, flash }));
  }

  function sendInvalidLink(reply: FastifyReply) {
    return sendIndex(reply, 404, { kind: "error", message: INVALID_TOKEN_MESSAGE });
  }

  /** Confirmation page for a live token; never unsubscribes. */
  async function sendConfirmation(reply: FastifyReply, rawToken: string) {
    const parsed = unsubscribeTokenSchema.safeParse(rawToken);
    const subscriber = parsed.success ? await store.findByToken(parsed.data) : null;
    if (!subscriber) return sendInvalidLink(reply);
    return reply
      .status(200)
      .header("Content-Type", HTML)
      .send(
        renderConfirmUnsubscribePage({
          appName,
          email: subscriber.email,
          token: subscriber.token,
        }),
      );
  }

  app.get("/", async (_request, reply) => sendIndex(reply, 200));

  app.post("/subscribe", async (request, reply) => {
    const parsed = subscribeBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return sendIndex(reply, 400, {
        kind: "error",
        message: parsed.error.issues[0]?.message ?? INVALID_EMAIL,
      });
    }
    const { email } = parsed.data;

    const result = await store.add(email);
    if (!result.success) {
      return sendIndex(reply, 500, { kind: "error", message: result.message });
    }

    if (result.isNew && sendWelcome) {
      void sendWelcome(email)
        .then((mail) => {
          if (!mail.sent) {
            request.log.warn({ email, err: mail.error }, "Welcome email not sent");
          }
        })
        .catch((err: unknown) => {
          request.log.error({ email, err }, "Welcome email failed");
        });
    }

    return reply
      .status(200)
      .header("Content-Type", HTML)
      .send(renderSuccessPage({ appName, action: "subscribe", message: result.message }));
  });

  app.get("/unsubscribe", async (request, reply) => {
    const query = unsubscribeQuerySchema.safeParse(request.query);
    const token = firstToken(query.success ? query.data.token : undefined);
    if (!token) return reply.redirect("/");
    return sendConfirmation(reply, token);
  });

  app.post("/unsubscribe", async (request, reply) => {
    const query = unsubscribeQuerySchema.safeParse(request.query);
    const form = unsubscribeFormSchema.safeParse(request.body ?? {});
    const fields = form.success ? form.data : {};
    const token = firstToken(
      query.success ? query.data.token : undefined,
      fields.token,
    );

    if (token) {
      if (fields.confirm !== "yes") return sendConfirmation(reply, token);

      const parsed = unsubscribeTokenSchema.safeParse(token);
      if (!parsed.success) return sendInvalidLink(reply);
      const result = await store.removeByToken(parsed.data);
      if (result.success) {
        request.log.info({ email: result.email }, "Unsubscribed via token");
        return reply
          .status(200)
          .header("Content-Type", HTML)
          .send(
            renderSuccessPage({ appName, action: "unsubscribe", message: result.message }),
          );
      }
      if (result.message === INVALID_TOKEN_MESSAGE) return sendInvalidLink(reply);
      return sendIndex(reply, 500, { kind: "error", message: GENERIC_ERROR });
    }

    const parsed = unsubscribeEmailBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return sendIndex(reply, 400, {
        kind: "error",
        message: parsed.error.issues[0]?.message ?? INVALID_EMAIL,
      });
    }
    const result = await store.remove(parsed.data.email);
    if (result.success) {
      return reply
        .status(200)
        .header("Content-Type", HTML)
        .send(
          renderSuccessPage({ appName, action: "unsubscribe", message: result.message }),
        );
    }
    const status = result.message === NOT_FOUND_MESSAGE ? 404 : 500;
    return sendIndex(reply, status, { kind: "error", message: result.message });
  });
}
