/**
 * Redirect route for single-process development.
 *
 * Mounted only with the memory storage driver, where the redirect service
 * cannot see the API's links. Production redirects go through apps/redirect.
 */

import type { FastifyInstance, FastifyPluginAsync } from "fastify";
import { NotFoundError, type ShortUrlResolver } from "@snaplink/core";
import { parseDevice } from "@snaplink/analytics";

const SHORT_CODE_REGEX = /^[A-Za-z0-9-]{1,50}$/;

export interface RedirectRoutesOptions {
  resolver: ShortUrlResolver;
}

export function redirectRoutes({ resolver }: RedirectRoutesOptions): FastifyPluginAsync {
  return async (fastify: FastifyInstance) => {
    fastify.get<{ Params: { code: string } }>("/:code", async (request, reply) => {
      const { code } = request.params;
      if (!SHORT_CODE_REGEX.test(code)) {
        throw new NotFoundError(code);
      }

      const userAgent = request.headers["user-agent"];
      const referrer = request.headers.referer;
      const result = await resolver.resolve(code, {
        ipAddress: request.ip,
        userAgent,
        referrer,
        device: parseDevice(userAgent),
      });
      if (!result.found) {
        throw new NotFoundError(code);
      }

      return reply
        .header("cache-control", "private, no-cache")
        .redirect(302, result.originalUrl);
    });
  };
}
