import { Request, Response, NextFunction, RequestHandler } from "express";

/**
 * Operator API key check.
 * Looks for key in: X-API-Key header, Authorization Bearer, or ?api_key query param.
 * An empty expected key means dev mode: every request passes.
 */
export function apiKeyAuth(expectedKey: string): RequestHandler {
  if (!expectedKey) {
    console.log(`[apiKeyAuth] OPERATOR_API_KEY not set, running in dev mode`);
  }

  return (req: Request, res: Response, next: NextFunction) => {
    if (!expectedKey) return next();

    const apiKey = extractApiKey(req);

    if (!apiKey) {
      res.status(401).json({
        error: "Missing API key. Provide via X-API-Key header, Authorization Bearer, or api_key query param"
      });
      return;
    }

    if (apiKey !== expectedKey) {
      console.warn(`[apiKeyAuth] Rejected request to ${req.method} ${req.path}`);
      res.status(401).json({ error: "Invalid API key" });
      return;
    }

    next();
  };
}

/**
 * Extract API key from request
 */
export function extractApiKey(req: Pick<Request, "headers" | "query">): string | null {
  // 1. X-API-Key header
  const headerKey = req.headers["x-api-key"];
  if (typeof headerKey === "string" && headerKey) {
    return headerKey;
  }

  // 2. Authorization: Bearer <key>
  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith("Bearer ")) {
    return authHeader.slice(7);
  }

  // 3. Query param
  const queryKey = req.query.api_key;
  if (typeof queryKey === "string" && queryKey) {
    return queryKey;
  }

  return null;
}
