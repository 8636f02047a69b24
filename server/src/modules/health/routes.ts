import type { FastifyInstance } from "fastify";
import { healthResponseSchema } from "@newsdesk/shared";
import type { SubscriberStore } from "../../db/subscribers.js";

export interface HealthRoutesOptions {
  store: Pick<SubscriberStore, "healthCheck" | "countActive">;
}

export async function healthRoutes(
  app: FastifyInstance,
  opts: HealthRoutesOptions,
) {
  app.get("/health", async (request, reply) => {
    const check = await opts.store.healthCheck();
    if (!check.ok) {
      request.log.error({ err: check.error }, "Health check failed");
      return reply.status(500).send(
        healthResponseSchema.parse({
          status: "unhealthy",
          error: "database connection failed",
        }),
      );
    }
    return reply.send(
      healthResponseSchema.parse({
        status: "healthy",
        subscribers: await opts.store.countActive(),
      }),
    );
  });
}
