import Fastify, { type FastifyInstance } from "fastify";
import formbody from "@fastify/formbody";
import rateLimit from "@fastify/rate-limit";
import {
  APP_NAME,
  LOGGER,
  RATE_LIMIT_MAX,
  RATE_LIMIT_TIME_WINDOW,
  TRUST_PROXY,
} from "./config.js";
import type { SubscriberStore } from "./db/subscribers.js";
import { healthRoutes } from "./modules/health/routes.js";
import { subscriptionRoutes } from "./modules/subscriptions/routes.js";
import type { SendWelcome } from "./services/dispatcher.js";

export interface RateLimitSettings {
  max: number;
  timeWindow: string;
}

export interface AppDeps {
  store: SubscriberStore;
  sendWelcome?: SendWelcome;
  appName?: string;
  /** Fastify's pino logger. Defaults to LOGGER. */
  logger?: boolean;
  /** false disables rate limiting. */
  rateLimit?: RateLimitSettings | false;
}

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const app = Fastify({
    logger: deps.logger ?? LOGGER,
    trustProxy: TRUST_PROXY,
  });

  await app.register(formbody);

  if (deps.rateLimit !== false) {
    await app.register(
      rateLimit,
      deps.rateLimit ?? { max: RATE_LIMIT_MAX, timeWindow: RATE_LIMIT_TIME_WINDOW },
    );
  }

  await app.register(healthRoutes, { store: deps.store });
  await app.register(subscriptionRoutes, {
    store: deps.store,
    appName: deps.appName ?? APP_NAME,
    sendWelcome: deps.sendWelcome,
  });

  return app;
}
