import { describe, it, expect, beforeAll, afterAll } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildServer } from "../../server";

let app: FastifyInstance;

beforeAll(async () => {
  app = await buildServer();
  await app.ready();
});

afterAll(async () => {
  await app.close();
});

/* ============= POST /api/patch ============= */

describe("POST /api/patch", () => {
  it("applies edits and returns the report and line summary", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/patch",
      payload: {
        document: "Alpha uses LSTM here.\n",
        edits: [{ location: "p1", original_text: "LSTM", modified_text: "Transformer" }],
      },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.document).toBe("Alpha uses Transformer here.\n");
    expect(body.report.applied).toEqual(["p1"]);
    expect(body.report.failed).toEqual([]);
    expect(body.summary.text).toBe("lines: 0 (2 → 2)");
  });

  it("reports an unmatched anchor as a failed edit, not an HTTP error", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/patch",
      payload: {
        document: "Alpha uses LSTM here.\n",
        edits: [{ location: "p9", original_text: "zzz qqq www", modified_text: "x" }],
      },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.document).toBe("Alpha uses LSTM here.\n");
    expect(body.report.failed).toHaveLength(1);
    expect(body.report.failed[0].location).toBe("p9");
  });

  it("requires a string document", async () => {
    const res = await app.inject({ method: "POST", url: "/api/patch", payload: { edits: [] } });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("document_required");
  });

  it("requires an edits array", async () => {
    const res = await app.inject({ method: "POST", url: "/api/patch", payload: { document: "x", edits: "nope" } });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("edits_required");
  });

  it("lists the positions of undecodable edits", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/patch",
      payload: {
        document: "x",
        edits: [{ original_text: "x", modified_text: "y" }, { original_text: 3 }, "bad"],
      },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: "invalid_edits", rejected: [1, 2] });
  });

  it("rejects a document with an unpaired surrogate", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/patch",
      payload: { document: "broken \ud800 text", edits: [] },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("malformed_document");
  });

  it("echoes an incoming request id", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/patch",
      headers: { "x-request-id": "req-test-1" },
      payload: { document: "a", edits: [] },
    });
    expect(res.headers["x-request-id"]).toBe("req-test-1");
  });
});

/* ============= POST /api/expand-heading ============= */

describe("POST /api/expand-heading", () => {
  it("returns the full section of a heading anchor", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/expand-heading",
      payload: { document: "# 3 A\nbody\n# 4 B\nmore", headingAnchor: "# 3 A" },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ section: "# 3 A\nbody", expanded: true });
  });

  it("returns the anchor unchanged when the heading is absent", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/expand-heading",
      payload: { document: "# 1 A\nbody", headingAnchor: "# 9 Missing" },
    });
    expect(res.json()).toEqual({ section: "# 9 Missing", expanded: false });
  });

  it("requires a heading anchor", async () => {
    const res = await app.inject({ method: "POST", url: "/api/expand-heading", payload: { document: "x" } });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("heading_anchor_required");
  });

  it("requires a string document", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/expand-heading",
      payload: { document: 42, headingAnchor: "# A" },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("malformed_document");
  });
});

/* ============= Health & Metrics ============= */

describe("GET /health", () => {
  it("reports the patch engine as up", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json().checks.patchEngine.status).toBe("up");
  });

  it("answers the probes", async () => {
    expect((await app.inject({ method: "GET", url: "/health/ready" })).json()).toEqual({ ready: true });
    expect((await app.inject({ method: "GET", url: "/health/live" })).json()).toEqual({ alive: true });
  });
});

describe("GET /metrics", () => {
  it("exposes the patch counters", async () => {
    const res = await app.inject({ method: "GET", url: "/metrics" });
    expect(res.statusCode).toBe(200);
    expect(res.body).toContain("# TYPE patchsvc_patch_edits_total counter");
  });
});
