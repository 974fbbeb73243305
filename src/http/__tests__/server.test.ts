import { afterAll, beforeAll, describe, expect, it } from "vitest";
import type http from "node:http";

import { ArtDocument } from "../../corpus/artDocument.js";
import { createInMemoryEngine } from "../engine.js";
import { startServer } from "../server.js";
import { NOT_FOUND_MESSAGE } from "../slack.js";
import { isRecord } from "../validation.js";

async function json(res: Response): Promise<Record<string, unknown>> {
  const body: unknown = await res.json();
  if (!isRecord(body)) throw new Error("expected a json object");
  return body;
}

describe("http server", () => {
  let server: http.Server;
  let base: string;

  beforeAll(async () => {
    const docs = [new ArtDocument(0, "\na happy cat\n", ["cat.txt"]), new ArtDocument(1, "a happy dog", ["dog.txt"])];
    // constant keys: the first candidate always wins in random mode
    const started = await startServer({ port: 0, engine: createInMemoryEngine(docs, { random: () => 0.5 }) });
    server = started.server;
    base = `http://127.0.0.1:${started.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  const form = (text: string, contentType = "application/x-www-form-urlencoded") =>
    fetch(`${base}/ascii`, { method: "POST", headers: { "content-type": contentType }, body: new URLSearchParams({ text }).toString() });

  const search = (body: string) => fetch(`${base}/search`, { method: "POST", headers: { "content-type": "application/json" }, body });

  it("reports health", async () => {
    const res = await fetch(`${base}/health`);
    expect(res.status).toBe(200);
    expect(await json(res)).toMatchObject({ status: "ok", service: "ascii_match", version: "0.1.0", documents: 2 });
  });

  it("answers the slash command with the art in a code block", async () => {
    const res = await form("cat");
    expect(res.status).toBe(200);
    expect(await json(res)).toEqual({
      response_type: "in_channel",
      blocks: [{ type: "section", text: { type: "mrkdwn", text: "```\na happy cat\n```" } }],
    });
  });

  it("tells the caller when nothing matches", async () => {
    for (const text of ["zebra", ""]) {
      const res = await form(text);
      expect(res.status).toBe(200);
      expect(await json(res)).toEqual({
        blocks: [{ type: "section", text: { type: "mrkdwn", text: "```\n" + NOT_FOUND_MESSAGE + "\n```" } }],
      });
    }
  });

  it("answers an overlong slash command with the not-found block", async () => {
    const res = await form("cat ".repeat(1100));
    expect(res.status).toBe(200);
    expect(await json(res)).toEqual({
      blocks: [{ type: "section", text: { type: "mrkdwn", text: "```\n" + NOT_FOUND_MESSAGE + "\n```" } }],
    });
  });

  it("rejects a slash command that is not form-encoded", async () => {
    const res = await form("cat", "application/json");
    expect(res.status).toBe(415);
    expect(res.headers.get("content-type")).toBe("application/problem+json");
    expect(await json(res)).toMatchObject({ code: "UNSUPPORTED_MEDIA_TYPE", status: 415, instance: "/ascii" });
  });

  it("searches over json", async () => {
    const res = await search(JSON.stringify({ query: "happy", selection: "top-score" }));
    expect(res.status).toBe(200);
    const body = await json(res);
    expect(body).toMatchObject({
      result: { id: 0, tags: ["cat.txt"], blob: "\na happy cat\n", score: 1 },
      candidates: 2,
    });
    expect(body.tookMs).toBeTypeOf("number");
  });

  it("returns a null result when nothing matches", async () => {
    const res = await search(JSON.stringify({ query: "" }));
    expect(await json(res)).toMatchObject({ result: null, candidates: 0 });
  });

  it("validates the search body", async () => {
    let res = await search(JSON.stringify({ query: 42 }));
    expect(res.status).toBe(400);
    expect((await json(res)).errors).toEqual([{ path: "$.query", message: "must be a string" }]);

    res = await search(JSON.stringify({ query: "cat", selection: "best" }));
    expect((await json(res)).errors).toEqual([{ path: "$.selection", message: "must be one of: random, top-score" }]);

    res = await search("{");
    expect(res.status).toBe(400);
    expect(await json(res)).toMatchObject({ code: "INVALID_ARGUMENT", detail: "body must be valid JSON" });

    res = await search("[]");
    expect(await json(res)).toMatchObject({ status: 400, detail: "body must be an object" });
  });

  it("accepts a null selection as the configured mode", async () => {
    const res = await search(JSON.stringify({ query: "cat", selection: null }));
    expect(res.status).toBe(200);
    expect(await json(res)).toMatchObject({ result: { id: 0 }, candidates: 1 });
  });

  it("picks a random document", async () => {
    const res = await fetch(`${base}/random`);
    expect(await json(res)).toEqual({ result: { id: 0, tags: ["cat.txt"], blob: "\na happy cat\n", score: 1 } });
  });

  it("serves documents by id", async () => {
    let res = await fetch(`${base}/documents/1`);
    expect(await json(res)).toEqual({ id: 1, tags: ["dog.txt"], blob: "a happy dog" });

    res = await fetch(`${base}/documents/9`);
    expect(res.status).toBe(404);
    expect(await json(res)).toMatchObject({ code: "NOT_FOUND", detail: "no document 9" });

    res = await fetch(`${base}/documents/abc`);
    expect(res.status).toBe(400);
  });

  it("answers unknown routes with 404", async () => {
    const res = await fetch(`${base}/nope`);
    expect(res.status).toBe(404);
    expect(await json(res)).toMatchObject({ type: "https://errors.ascii-match.local/not-found", title: "Not found" });
  });
});
