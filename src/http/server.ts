import http from "node:http";
import { randomUUID } from "node:crypto";

import { PROBLEM_CONTENT_TYPE, problem, type FieldError, type Problem } from "./problem.js";
import { asInt, asNumber, asString, checkLimit, intParam, isRecord, pushErr } from "./validation.js";
import { QueryEngine, isBackendKind, type BackendKind } from "../core/impl/queryEngine.js";
import { isAutocompleteError } from "../core/errors.js";
import type { Term } from "../core/types.js";

const SERVICE = "topk-complete";
const VERSION = "0.1.0";
const DEFAULT_K = 10;
const MAX_TERMS_PER_REQUEST = 100_000;

export interface ServerOptions {
  port?: number;
  metricsEnabled?: boolean;
  /** Initial engine; an empty one on `backend` is created when omitted. */
  engine?: QueryEngine;
  backend?: BackendKind;
  maxK?: number;
  /** Access and lifecycle log sink. Defaults to console.log. */
  log?: (line: string) => void;
}

interface Counters {
  requests: number;
  completions: number;
  dictionaryLoads: number;
  errors: number;
}

class BadJsonError extends Error {}

export function createServer(opts: ServerOptions = {}): http.Server {
  const start = Date.now();
  const metricsEnabled = opts.metricsEnabled ?? false;
  const maxK = opts.maxK ?? 100;
  const log = opts.log ?? ((line: string) => console.log(line));
  const counters: Counters = { requests: 0, completions: 0, dictionaryLoads: 0, errors: 0 };

  // replaced as a whole by PUT /dictionary; queries never mutate it
  let engine = opts.engine ?? new QueryEngine([], { backend: opts.backend });

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const started = Date.now();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    counters.requests++;

    res.setHeader("x-request-id", requestId);
    res.on("finish", () => {
      if (res.statusCode >= 500) counters.errors++;
      log(`${req.method} ${url.pathname} ${res.statusCode} ${Date.now() - started}ms ${requestId}`);
    });

    const fail = (status: number, code: string, detail: string, errors?: FieldError[]) =>
      sendProblem(res, problem({ status, code, detail, instance: url.pathname, requestId, errors }));

    try {
      if (req.method === "GET" && url.pathname === "/health") {
        return sendJson(res, 200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
          backend: engine.backend,
          terms: engine.size,
        });
      }

      if (req.method === "GET" && url.pathname === "/metrics") {
        if (!metricsEnabled) return fail(404, "NOT_FOUND", "metrics not enabled");
        res.statusCode = 200;
        res.setHeader("content-type", "text/plain; version=0.0.4");
        res.end(renderMetrics(counters, engine.size));
        return;
      }

      if (url.pathname === "/complete" && (req.method === "GET" || req.method === "POST")) {
        let prefix: string | undefined;
        let k: number;
        const errors: FieldError[] = [];

        if (req.method === "GET") {
          prefix = url.searchParams.get("prefix") ?? undefined;
          k = intParam(url.searchParams.get("k")) ?? DEFAULT_K;
        } else {
          if (!isJson(req)) return fail(415, "UNSUPPORTED_MEDIA_TYPE", "content-type must be application/json");
          const body = await readJson(req);
          if (!isRecord(body)) return fail(400, "INVALID_ARGUMENT", "body must be an object");
          prefix = asString(body.prefix);
          k = body.k === undefined ? DEFAULT_K : (asInt(body.k) ?? Number.NaN);
        }

        if (prefix === undefined) pushErr(errors, "$.prefix", "must be a string");
        checkLimit(errors, "$.k", k, maxK);
        if (errors.length || prefix === undefined) return fail(400, "INVALID_ARGUMENT", "invalid request", errors);

        const matches = engine.rankedMatches(prefix, k);
        counters.completions++;
        return sendJson(res, 200, {
          prefix,
          matches: matches.map((t) => ({ word: t.word, weight: t.weight })),
          tookMs: Date.now() - started,
        });
      }

      if (req.method === "GET" && url.pathname === "/top") {
        const prefix = url.searchParams.get("prefix");
        if (prefix === null) return fail(400, "INVALID_ARGUMENT", "invalid request", [{ path: "$.prefix", message: "must be a string" }]);
        counters.completions++;
        return sendJson(res, 200, { prefix, match: engine.topMatch(prefix) });
      }

      if (req.method === "GET" && url.pathname === "/weight") {
        const word = url.searchParams.get("word");
        if (word === null) return fail(400, "INVALID_ARGUMENT", "invalid request", [{ path: "$.word", message: "must be a string" }]);
        return sendJson(res, 200, { word, weight: engine.weightOf(word) });
      }

      if (req.method === "PUT" && url.pathname === "/dictionary") {
        if (!isJson(req)) return fail(415, "UNSUPPORTED_MEDIA_TYPE", "content-type must be application/json");
        const body = await readJson(req);
        if (!isRecord(body)) return fail(400, "INVALID_ARGUMENT", "body must be an object");

        const errors: FieldError[] = [];
        const termsVal = body.terms;
        if (!Array.isArray(termsVal)) pushErr(errors, "$.terms", "must be an array");
        if (Array.isArray(termsVal) && termsVal.length > MAX_TERMS_PER_REQUEST) {
          pushErr(errors, "$.terms", `must contain at most ${MAX_TERMS_PER_REQUEST} items`);
        }

        const backendVal = body.backend ?? engine.backend;
        if (!isBackendKind(backendVal)) pushErr(errors, "$.backend", "must be one of: trie, sorted-array, brute-force");

        const terms: Term[] = [];
        const items: unknown[] = Array.isArray(termsVal) ? termsVal : [];
        items.forEach((t, i) => {
          const word = isRecord(t) ? asString(t.word) : undefined;
          const weight = isRecord(t) ? asNumber(t.weight) : undefined;
          if (word === undefined) pushErr(errors, `$.terms[${i}].word`, "must be a string");
          if (weight === undefined) pushErr(errors, `$.terms[${i}].weight`, "must be a finite number");
          if (word !== undefined && weight !== undefined) terms.push({ word, weight });
        });

        if (errors.length || !isBackendKind(backendVal)) return fail(400, "INVALID_ARGUMENT", "invalid request", errors);

        engine = new QueryEngine(terms, { backend: backendVal });
        counters.dictionaryLoads++;
        log(`dictionary replaced: ${engine.size} terms on ${engine.backend}`);
        return sendJson(res, 200, { terms: engine.size, backend: engine.backend });
      }

      return fail(404, "NOT_FOUND", "not found");
    } catch (e) {
      if (e instanceof BadJsonError) return fail(400, "INVALID_ARGUMENT", "malformed JSON body");
      if (isAutocompleteError(e)) {
        const status = e.code === "DUPLICATE_WORD" || e.code === "NEGATIVE_WEIGHT" ? 422 : 400;
        return fail(status, e.code, e.message);
      }
      log(`unhandled error ${requestId}: ${e instanceof Error ? e.stack ?? e.message : String(e)}`);
      return fail(500, "INTERNAL", "internal error");
    }
  });
}

export async function startServer(opts: ServerOptions = {}): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? Number(process.env.PORT ?? 3000);

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

function renderMetrics(c: Counters, terms: number): string {
  return [
    "# TYPE topk_requests_total counter",
    `topk_requests_total ${c.requests}`,
    "# TYPE topk_completions_total counter",
    `topk_completions_total ${c.completions}`,
    "# TYPE topk_dictionary_loads_total counter",
    `topk_dictionary_loads_total ${c.dictionaryLoads}`,
    "# TYPE topk_errors_total counter",
    `topk_errors_total ${c.errors}`,
    "# TYPE topk_dictionary_terms gauge",
    `topk_dictionary_terms ${terms}`,
    "",
  ].join("\n");
}

function isJson(req: http.IncomingMessage): boolean {
  const ct = (req.headers["content-type"] ?? "").toString();
  return (ct.split(";")[0] ?? "").trim().toLowerCase() === "application/json";
}

async function readJson(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c));
  const raw = Buffer.concat(chunks).toString("utf8");
  if (!raw.length) return null;
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new BadJsonError(e instanceof Error ? e.message : "malformed JSON");
  }
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(data);
}

function sendProblem(res: http.ServerResponse, body: Problem): void {
  const data = JSON.stringify(body);
  res.statusCode = body.status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(data);
}
