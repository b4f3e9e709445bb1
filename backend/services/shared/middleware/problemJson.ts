// backend/services/shared/middleware/problemJson.ts

/**
 * RFC 7807 Problem+JSON formatting for 404s and thrown errors.
 *
 * Notes:
 * - Transport-level formatting only, no business logic.
 * - 404s are only formatted for known prefixes; anything else gets a bare 404.
 * - 5xx are logged at error level; 4xx at info (caller input, not a failure).
 */

import type { Request, Response, NextFunction } from "express";

export type ProblemBody = {
  type: string;
  title: string;
  status: number;
  detail: string;
  instance?: string;
};

type ErrorFields = {
  status: number;
  type?: string;
  title?: string;
  message?: string;
};

function readString(o: object, key: string): string | undefined {
  const v: unknown = Reflect.get(o, key);
  return typeof v === "string" && v.trim() !== "" ? v : undefined;
}

function readStatus(o: object): number {
  for (const key of ["statusCode", "status"]) {
    const n = Number(Reflect.get(o, key));
    if (Number.isInteger(n) && n >= 400 && n <= 599) return n;
  }
  return 500;
}

/** Pull the fields we trust out of whatever was thrown. */
export function readErrorFields(err: unknown): ErrorFields {
  if (typeof err !== "object" || err === null) {
    return {
      status: 500,
      message: typeof err === "string" && err ? err : undefined,
    };
  }
  const type = readString(err, "type");
  return {
    status: readStatus(err),
    // body-parser sets type to a slug ("entity.parse.failed"); only URIs pass through
    type: type && type.includes(":") ? type : undefined,
    title: readString(err, "title"),
    message: readString(err, "message"),
  };
}

function defaultTitle(status: number): string {
  if (status >= 500) return "Internal Server Error";
  if (status === 400) return "Bad Request";
  if (status === 404) return "Not Found";
  return "Request Error";
}

function requestId(req: Request): string | undefined {
  return typeof req.id === "string" || typeof req.id === "number"
    ? String(req.id)
    : undefined;
}

export function toProblem(err: unknown, instance?: string): ProblemBody {
  const f = readErrorFields(err);
  return {
    type: f.type ?? "about:blank",
    title: f.title ?? defaultTitle(f.status),
    status: f.status,
    detail: f.message ?? "Unexpected error",
    instance,
  };
}

/**
 * 404 formatter: only emits Problem+JSON for known API/health prefixes.
 */
export function notFoundProblemJson(validPrefixes: string[]) {
  return (req: Request, res: Response) => {
    if (validPrefixes.some((p) => req.path.startsWith(p))) {
      const body: ProblemBody = {
        type: "about:blank",
        title: "Not Found",
        status: 404,
        detail: "Route not found",
        instance: requestId(req),
      };
      return res.status(404).type("application/problem+json").json(body);
    }
    return res.status(404).end();
  };
}

/**
 * Error formatter: converts any thrown/next(err) into Problem+JSON.
 */
export function errorProblemJson() {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const problem = toProblem(err, requestId(req));

    if (problem.status >= 500) {
      req.log.error(
        { status: problem.status, path: req.originalUrl, err },
        "request error"
      );
    } else {
      req.log.info(
        { status: problem.status, path: req.originalUrl },
        "request rejected"
      );
    }

    res
      .status(problem.status)
      .type("application/problem+json")
      .json(problem);
  };
}
