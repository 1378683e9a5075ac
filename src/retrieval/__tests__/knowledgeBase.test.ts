import { describe, it, expect, vi } from "vitest";
import { batchUploadToKnowledgeBase, buildUploadPayload, uploadToKnowledgeBase } from "../knowledgeBase";
import { config } from "../../config";

/* ============= buildUploadPayload ============= */

describe("buildUploadPayload", () => {
  it("uses the indexer's field names and disables the vision model by default", () => {
    expect(buildUploadPayload({ fileUrl: "http://store.test/a.md", projectId: "proj-1" })).toEqual({
      minio_url: "http://store.test/a.md",
      project_id: "proj-1",
      enable_vlm: false,
    });
  });
});

/* ============= uploadToKnowledgeBase ============= */

describe("uploadToKnowledgeBase", () => {
  it("posts the payload and reports the cached path", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response(JSON.stringify({ status: "ok", file_path: "/cache/a.md" }), { status: 200 })
    );
    vi.stubGlobal("fetch", fetchMock);

    const result = await uploadToKnowledgeBase({ fileUrl: "http://store.test/a.md", projectId: "proj-1", enableVlm: true });

    expect(result).toEqual({
      success: true,
      fileUrl: "http://store.test/a.md",
      filePath: "/cache/a.md",
      result: { status: "ok", file_path: "/cache/a.md" },
    });
    expect(fetchMock).toHaveBeenCalledWith(config.retrieval.processUrl, expect.objectContaining({ method: "POST" }));
    expect(JSON.parse(fetchMock.mock.calls[0][1].body)).toEqual({
      minio_url: "http://store.test/a.md",
      project_id: "proj-1",
      enable_vlm: true,
    });
  });

  it("falls back to local_path and omits a missing path", async () => {
    vi.stubGlobal(
      "fetch",
      vi
        .fn()
        .mockResolvedValueOnce(new Response(JSON.stringify({ local_path: "/cache/b.md" }), { status: 200 }))
        .mockResolvedValueOnce(new Response("[]", { status: 200 }))
    );

    const withLocal = await uploadToKnowledgeBase({ fileUrl: "http://store.test/b.md", projectId: "p" });
    const without = await uploadToKnowledgeBase({ fileUrl: "http://store.test/c.md", projectId: "p" });

    expect(withLocal).toMatchObject({ success: true, filePath: "/cache/b.md" });
    expect(without).toEqual({ success: true, fileUrl: "http://store.test/c.md", result: [] });
  });

  it("quotes the start of an error body", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("x".repeat(300), { status: 500 })));

    const result = await uploadToKnowledgeBase({ fileUrl: "http://store.test/a.md", projectId: "p" });
    expect(result).toEqual({
      success: false,
      fileUrl: "http://store.test/a.md",
      error: `Knowledge base returned 500: ${"x".repeat(200)}`,
    });
  });

  it("rejects a non-JSON answer", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("<html>ok</html>", { status: 200 })));

    const result = await uploadToKnowledgeBase({ fileUrl: "http://store.test/a.md", projectId: "p" });
    expect(result).toEqual({
      success: false,
      fileUrl: "http://store.test/a.md",
      error: "Knowledge base answered with non-JSON: <html>ok</html>",
    });
  });

  it("reports an unreachable indexer without throwing", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new Error("connect ECONNREFUSED")));

    const result = await uploadToKnowledgeBase({ fileUrl: "http://store.test/a.md", projectId: "p" });
    expect(result).toEqual({
      success: false,
      fileUrl: "http://store.test/a.md",
      error: `Knowledge base unreachable (${config.retrieval.processUrl}): connect ECONNREFUSED`,
    });
  });
});

/* ============= batchUploadToKnowledgeBase ============= */

describe("batchUploadToKnowledgeBase", () => {
  it("uploads in order and counts successes", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response("{}", { status: 200 }))
      .mockResolvedValueOnce(new Response("down", { status: 503 }))
      .mockResolvedValueOnce(new Response("{}", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const batch = await batchUploadToKnowledgeBase(
      ["http://store.test/a.md", "http://store.test/b.md", "http://store.test/c.md"],
      "proj-1"
    );

    expect(batch.successCount).toBe(2);
    expect(batch.total).toBe(3);
    expect(batch.results.map((r) => [r.fileUrl, r.success])).toEqual([
      ["http://store.test/a.md", true],
      ["http://store.test/b.md", false],
      ["http://store.test/c.md", true],
    ]);
    const urls = fetchMock.mock.calls.map((call) => JSON.parse(call[1].body).minio_url);
    expect(urls).toEqual(["http://store.test/a.md", "http://store.test/b.md", "http://store.test/c.md"]);
  });
});
