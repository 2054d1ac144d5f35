import request from "supertest";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "@log-categorizer/core";
import { SummarizerError } from "@log-categorizer/shared";
import { createApp } from "./app.js";

// Categorizing must work without ever loading the AI client
vi.mock("@github/copilot-sdk", () => {
  throw new Error("@github/copilot-sdk must not be loaded");
});

const config = loadConfig({ NODE_ENV: "test" });

describe("Log Categorizer API", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("GET /api/health", () => {
    it("should report ok", async () => {
      const res = await request(createApp({ config })).get("/api/health");
      expect(res.status).toBe(200);
      expect(res.body.status).toBe("ok");
      expect(res.headers["x-content-type-options"]).toBe("nosniff");
    });
  });

  describe("CORS", () => {
    it("should allow the server's own origin outside production", async () => {
      const origin = `http://localhost:${config.port}`;
      const res = await request(createApp({ config })).get("/api/health").set("Origin", origin);
      expect(res.headers["access-control-allow-origin"]).toBe(origin);
    });

    it("should not allow other local origins", async () => {
      const res = await request(createApp({ config }))
        .get("/api/health")
        .set("Origin", "http://localhost:5173");
      expect(res.headers["access-control-allow-origin"]).toBeUndefined();
    });
  });

  describe("GET /api/rules", () => {
    it("should list the built-in rules in priority order", async () => {
      const res = await request(createApp({ config })).get("/api/rules");
      expect(res.status).toBe(200);
      expect(res.body.success).toBe(true);
      expect(res.body.data).toHaveLength(9);
      expect(res.body.data[0]).toEqual({
        label: "NetworkError",
        matcher: { type: "regex", pattern: "nsUtils.*err:\\s*5|[Nn]etwork\\s+list.*err:\\s*5" },
        severity: "High",
      });
    });
  });

  describe("POST /api/categorize", () => {
    it("should categorize uploaded files", async () => {
      const res = await request(createApp({ config }))
        .post("/api/categorize")
        .attach("files", Buffer.from("ok\nHTTP response code: 403\n"), "b.log")
        .attach("files", Buffer.from("2024-01-01 Ticket ID was not found\n"), "a.txt");

      expect(res.status).toBe(200);
      expect(res.body.success).toBe(true);
      expect(res.body.data.detailed).toEqual([
        {
          label: "Auth_TicketMissing",
          sourceFile: "a.txt",
          lineNumber: 1,
          rawText: "2024-01-01 Ticket ID was not found",
          severity: "High",
          timestamp: "2024-01-01T00:00:00.000Z",
        },
        {
          label: "Proxy403",
          sourceFile: "b.log",
          lineNumber: 2,
          rawText: "HTTP response code: 403",
          severity: "Medium",
        },
      ]);
      expect(res.body.data.summary.map((record: { label: string }) => record.label)).toEqual([
        "Auth_TicketMissing",
        "Proxy403",
      ]);
      expect(res.body.data.skipped).toEqual([]);
    });

    it("should apply rules sent with the upload before the built-ins", async () => {
      const rules = JSON.stringify([{ label: "Mine", matcher: { type: "contains", value: "403" } }]);
      const res = await request(createApp({ config }))
        .post("/api/categorize")
        .field("rules", rules)
        .attach("files", Buffer.from("HTTP response code: 403\n"), "a.log");

      expect(res.status).toBe(200);
      expect(res.body.data.summary).toEqual([
        { label: "Mine", count: 1, percentage: 100, files: ["a.log"], sampleMessage: "HTTP response code: 403" },
      ]);
    });

    it("should reject an invalid rule set", async () => {
      const rules = JSON.stringify([{ label: "Bad", matcher: { type: "regex", pattern: "(" } }]);
      const res = await request(createApp({ config }))
        .post("/api/categorize")
        .field("rules", rules)
        .attach("files", Buffer.from("x\n"), "a.log");

      expect(res.status).toBe(400);
      expect(res.body.success).toBe(false);
      expect(res.body.error).toMatch(/^Invalid rule set:/);
    });

    it("should report undecodable uploads as skipped", async () => {
      const res = await request(createApp({ config }))
        .post("/api/categorize")
        .attach("files", Buffer.from([0x61, 0x00, 0x62]), "bin.log");

      expect(res.status).toBe(200);
      expect(res.body.data.skipped).toEqual([
        { sourceFile: "bin.log", kind: "undecodable", reason: "binary content (NUL byte found)" },
      ]);
    });

    it("should require at least one file", async () => {
      const res = await request(createApp({ config })).post("/api/categorize").field("rules", "");
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ success: false, error: "No files uploaded" });
    });

    it("should reject other file types", async () => {
      const res = await request(createApp({ config }))
        .post("/api/categorize")
        .attach("files", Buffer.from("x"), "notes.md");

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("Invalid file: notes.md. Allowed types: .log, .txt");
    });

    it("should reject more than ten files", async () => {
      let req = request(createApp({ config })).post("/api/categorize");
      for (let i = 0; i < 11; i++) {
        req = req.attach("files", Buffer.from("x\n"), `f${i}.log`);
      }
      const res = await req;

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("Too many files. Maximum is 10 files per request.");
    });
  });

  describe("POST /api/summarize", () => {
    it("should return the analysis", async () => {
      const summarize = vi.fn(async () => "## Findings");
      const res = await request(createApp({ config, summarize }))
        .post("/api/summarize")
        .send({ markdown: "# Error Summary" });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ success: true, data: { analysis: "## Findings" } });
      expect(summarize).toHaveBeenCalledWith("# Error Summary");
    });

    it("should require markdown", async () => {
      const res = await request(createApp({ config, summarize: vi.fn() })).post("/api/summarize").send({});
      expect(res.status).toBe(400);
      expect(res.body.success).toBe(false);
    });

    it("should map summarizer failures to 502 with their kind", async () => {
      const summarize = vi.fn(async (): Promise<string> => {
        throw new SummarizerError("rate-limit", "Quota or rate limit reached");
      });
      const res = await request(createApp({ config, summarize }))
        .post("/api/summarize")
        .send({ markdown: "# Error Summary" });

      expect(res.status).toBe(502);
      expect(res.body).toEqual({ success: false, error: "Quota or rate limit reached", kind: "rate-limit" });
    });

    it("should report a missing credential without contacting the service", async () => {
      const res = await request(createApp({ config }))
        .post("/api/summarize")
        .send({ markdown: "# Error Summary" });

      expect(res.status).toBe(502);
      expect(res.body.kind).toBe("missing-credential");
    });
  });
});
