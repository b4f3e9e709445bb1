// backend/services/shared/middleware/jsonBody.ts
import express, { type RequestHandler } from "express";

/**
 * JSON-only body parsing. A request declaring any other media type is
 * refused with 415 instead of reaching a handler unparsed. Requests that
 * declare no content type pass through with no body.
 */
export function jsonBody(limit = "2mb"): RequestHandler {
  const parse = express.json({ limit });

  return (req, res, next) => {
    if (req.headers["content-type"] && !req.is("application/json")) {
      next(
        Object.assign(new Error("Request body must be application/json"), {
          statusCode: 415,
          title: "Unsupported Media Type",
        })
      );
      return;
    }
    parse(req, res, next);
  };
}
