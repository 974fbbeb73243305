import http from "node:http";
import { randomUUID } from "node:crypto";

import { isSelectionMode, SELECTION_MODES, type SelectionMode } from "../core/selector.js";
import { createNoopLogger, type Logger } from "../logging.js";
import type { Engine } from "./engine.js";
import { PROBLEM_CONTENT_TYPE, problem, type FieldError, type Problem } from "./problem.js";
import { artResponse, notFoundResponse } from "./slack.js";
import { asString, isRecord, pushErr } from "./validation.js";

const SERVICE = "ascii_match";
const VERSION = "0.1.0";
const MAX_QUERY_LENGTH = 4096;

export interface ServerOptions {
  port?: number;
  engine: Engine;
  logger?: Logger;
}

class BadRequestError extends Error {}

export function createServer(opts: ServerOptions): http.Server {
  const start = Date.now();
  const engine = opts.engine;
  const logger = opts.logger ?? createNoopLogger();

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const started = Date.now();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    res.on("finish", () => {
      logger.info("request", {
        requestId,
        method: req.method ?? "",
        path: url.pathname,
        status: res.statusCode,
        durationMs: Date.now() - started,
      });
    });

    const fail = (status: number, body: Problem): void => sendProblem(res, status, body);

    try {
      if (req.method === "GET" && url.pathname === "/health") {
        return sendJson(res, 200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
          documents: engine.size(),
        });
      }

      // slash command: form-encoded, `text` holds the query
      if (req.method === "POST" && url.pathname === "/ascii") {
        if (contentType(req) !== "application/x-www-form-urlencoded") {
          return fail(415, problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/x-www-form-urlencoded", instance: url.pathname, requestId }));
        }
        const form = new URLSearchParams(await readBody(req));
        const qs = form.get("text") ?? "";
        if (qs.length > MAX_QUERY_LENGTH) return sendJson(res, 200, notFoundResponse());

        const r = engine.search({ query: qs });
        return sendJson(res, 200, r.result ? artResponse(r.result.blob) : notFoundResponse());
      }

      if (req.method === "POST" && url.pathname === "/search") {
        if (contentType(req) !== "application/json") {
          return fail(415, problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", instance: url.pathname, requestId }));
        }

        const body = await readJson(req);
        if (!isRecord(body)) {
          return fail(400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be an object", instance: url.pathname, requestId }));
        }

        const errors: FieldError[] = [];
        const rawQuery = asString(body.query);
        if (rawQuery === undefined) pushErr(errors, "$.query", "must be a string");
        else if (rawQuery.length > MAX_QUERY_LENGTH) pushErr(errors, "$.query", "too long");
        const query = rawQuery ?? "";

        let selection: SelectionMode | undefined;
        if (isSelectionMode(body.selection)) selection = body.selection;
        else if (body.selection != null) pushErr(errors, "$.selection", `must be one of: ${SELECTION_MODES.join(", ")}`);

        if (errors.length) {
          return fail(400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance: url.pathname, requestId, errors }));
        }

        const r = engine.search({ query, selection });
        return sendJson(res, 200, { result: r.result, candidates: r.candidates, tookMs: Date.now() - started });
      }

      if (req.method === "GET" && url.pathname === "/random") {
        return sendJson(res, 200, { result: engine.random() });
      }

      const docMatch = /^\/documents\/([^/]+)$/.exec(url.pathname);
      if (req.method === "GET" && docMatch) {
        const raw = docMatch[1] ?? "";
        const id = /^\d+$/.test(raw) ? Number(raw) : NaN;
        if (!Number.isSafeInteger(id)) {
          const errors: FieldError[] = [];
          pushErr(errors, "id", "must be a non-negative integer");
          return fail(400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance: url.pathname, requestId, errors }));
        }
        const doc = engine.get(id);
        if (!doc) {
          return fail(404, problem({ status: 404, code: "NOT_FOUND", detail: `no document ${id}`, instance: url.pathname, requestId }));
        }
        return sendJson(res, 200, doc);
      }

      return fail(404, problem({ status: 404, code: "NOT_FOUND", detail: "not found", instance: url.pathname, requestId }));
    } catch (e) {
      if (e instanceof BadRequestError) {
        return fail(400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: e.message, instance: url.pathname, requestId }));
      }
      logger.error("request failed", e instanceof Error ? e : new Error(String(e)), { requestId, path: url.pathname });
      return fail(500, problem({ status: 500, code: "INTERNAL", detail: "internal error", instance: url.pathname, requestId }));
    }
  });
}

export async function startServer(opts: ServerOptions): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? 3000;

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

function contentType(req: http.IncomingMessage): string {
  const ct = (req.headers["content-type"] ?? "").toString();
  return (ct.split(";")[0] ?? "").trim().toLowerCase();
}

async function readBody(req: http.IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c));
  return Buffer.concat(chunks).toString("utf8");
}

async function readJson(req: http.IncomingMessage): Promise<unknown> {
  const raw = await readBody(req);
  if (!raw.length) return null;
  try {
    return JSON.parse(raw);
  } catch {
    throw new BadRequestError("body must be valid JSON");
  }
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(data);
}

function sendProblem(res: http.ServerResponse, status: number, body: Problem): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(data);
}
