import type { Handler } from "../api/types.js";
import type { Middleware } from "./middleware.js";

/**
 * Fold an ordered middleware list around a transport. The first entry is the
 * outermost: it sees the request first and the response last.
 */
export function composeMiddleware(middleware: readonly Middleware[], transport: Handler): Handler {
  return middleware.reduceRight<Handler>((next, current) => current.handler()(next), transport);
}
