/**
 * Notification log routes.
 *
 * GET /api/v1/events           : Committed notifications in log order
 * GET /api/v1/events/integrity : Hash chain verification result
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { RequestValidationError } from "../types/error.js";
import { formatZodErrors } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/events?afterPosition=&limit=
  routes.get("/", (c) => {
    const service = c.get("service");

    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      throw new RequestValidationError(
        "Invalid query parameters",
        formatZodErrors(queryResult.error),
      );
    }

    const query = queryResult.data;
    const events = service.readEvents({
      fromPosition: query.afterPosition + 1,
      maxCount: query.limit + 1,
    });

    return c.json(paginate(events, query.limit, (e) => e.globalPosition));
  });

  routes.get("/integrity", (c) => {
    return c.json(c.get("service").verifyIntegrity());
  });

  return routes;
}
