import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile, access } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { Logger } from "pino";
import type { ManifestEntry } from "../schemas/manifest.js";
import { DownloadError } from "../errors/catalog.js";
import { createMockGateway, MOCK_GATEWAY_URL } from "../test-utils/index.js";
import { contentUrl, createDownloader } from "./downloader.js";
import type { ProgressSink } from "./progress.js";

const CONTENT = Buffer.from("0123456789abcdefghij");

const ENTRY: ManifestEntry = {
  name: "a.vk",
  contentID: "Qm1",
  digestPrefix: "deadbeefdeadbeefdeadbeefdeadbeef",
  requiredSize: 0,
};

function makeMockLogger(): Logger {
  const mockLogger: Partial<Logger> = {
    info: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  };
  return mockLogger as Logger;
}

function makeSink(): ProgressSink {
  return { start: vi.fn(), advance: vi.fn(), finish: vi.fn() };
}

describe("params/downloader", () => {
  let tempDir: string;
  let path: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "downloader-test-"));
    path = join(tempDir, "a.vk");
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("contentUrl", () => {
    it("appends the cid to the gateway prefix", () => {
      expect(contentUrl("https://proofs.filecoin.io/ipfs/", ENTRY).href).toBe(
        "https://proofs.filecoin.io/ipfs/Qm1",
      );
    });

    it("throws for a prefix that does not form a URL", () => {
      expect(() => contentUrl("not-a-url/", ENTRY)).toThrow(TypeError);
    });
  });

  it("downloads a missing file from offset 0", async () => {
    const gateway = createMockGateway({ Qm1: CONTENT });
    const sink = makeSink();
    const downloader = createDownloader({
      gatewayUrl: MOCK_GATEWAY_URL,
      logger: makeMockLogger(),
      fetchFn: gateway.fetchFn,
      progress: () => sink,
    });

    await downloader.fetch(new AbortController().signal, path, ENTRY);

    expect(await readFile(path)).toEqual(CONTENT);
    expect(gateway.requests).toEqual([
      { url: `${MOCK_GATEWAY_URL}Qm1`, cid: "Qm1", range: "bytes=0-" },
    ]);
    expect(sink.start).toHaveBeenCalledWith(20, 0);
    expect(sink.advance).toHaveBeenCalledWith(20);
    expect(sink.finish).toHaveBeenCalledTimes(1);
  });

  it("resumes a partial file by appending the remaining bytes", async () => {
    await writeFile(path, CONTENT.subarray(0, 8));
    const gateway = createMockGateway({ Qm1: CONTENT });
    const sink = makeSink();
    const downloader = createDownloader({
      gatewayUrl: MOCK_GATEWAY_URL,
      logger: makeMockLogger(),
      fetchFn: gateway.fetchFn,
      progress: () => sink,
    });

    await downloader.fetch(new AbortController().signal, path, ENTRY);

    expect(gateway.requests[0]?.range).toBe("bytes=8-");
    expect(await readFile(path)).toEqual(CONTENT);
    expect(sink.start).toHaveBeenCalledWith(20, 8);
  });

  it("never rewrites bytes already on disk", async () => {
    await writeFile(path, "XXXX");
    const gateway = createMockGateway({ Qm1: CONTENT });
    const downloader = createDownloader({
      gatewayUrl: MOCK_GATEWAY_URL,
      logger: makeMockLogger(),
      fetchFn: gateway.fetchFn,
    });

    await downloader.fetch(new AbortController().signal, path, ENTRY);

    expect((await readFile(path)).toString()).toBe(
      "XXXX" + CONTENT.subarray(4).toString(),
    );
  });

  it("rejects with DownloadError on a non-2xx response", async () => {
    const gateway = createMockGateway({}, { status: 503 });
    const downloader = createDownloader({
      gatewayUrl: MOCK_GATEWAY_URL,
      logger: makeMockLogger(),
      fetchFn: gateway.fetchFn,
    });

    const err = await downloader
      .fetch(new AbortController().signal, path, ENTRY)
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DownloadError);
    expect(err).toMatchObject({ status: 503 });
    expect(gateway.requests).toHaveLength(1);
  });

  it("removes the local file when a range request is refused", async () => {
    await writeFile(path, CONTENT);
    const logger = makeMockLogger();
    const gateway = createMockGateway({}, { status: 416 });
    const downloader = createDownloader({
      gatewayUrl: MOCK_GATEWAY_URL,
      logger,
      fetchFn: gateway.fetchFn,
    });

    const err = await downloader
      .fetch(new AbortController().signal, path, ENTRY)
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DownloadError);
    expect(err).toMatchObject({ status: 416 });
    expect(gateway.requests[0]?.range).toBe("bytes=20-");
    await expect(access(path)).rejects.toMatchObject({ code: "ENOENT" });
    expect(logger.warn).toHaveBeenCalledWith(
      { path, status: 416, offset: 20 },
      "Range request refused; removing partial file",
    );
  });

  it("creates an empty file before the request is made", async () => {
    const downloader = createDownloader({
      gatewayUrl: MOCK_GATEWAY_URL,
      logger: makeMockLogger(),
      fetchFn: vi.fn().mockRejectedValue(new Error("network disabled in test")),
    });

    await expect(
      downloader.fetch(new AbortController().signal, path, ENTRY),
    ).rejects.toThrow("network disabled in test");
    await expect(access(path)).resolves.toBeUndefined();
    expect((await readFile(path)).length).toBe(0);
  });

  it("makes exactly one attempt", async () => {
    const fetchFn = vi.fn().mockRejectedValue(new Error("connection reset"));
    const downloader = createDownloader({
      gatewayUrl: MOCK_GATEWAY_URL,
      logger: makeMockLogger(),
      fetchFn,
    });

    await expect(
      downloader.fetch(new AbortController().signal, path, ENTRY),
    ).rejects.toThrow("connection reset");
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("passes the abort signal to the request", async () => {
    let release = () => {};
    const hold = new Promise<void>((resolve) => {
      release = resolve;
    });
    const gateway = createMockGateway({ Qm1: CONTENT }, { hold });
    const downloader = createDownloader({
      gatewayUrl: MOCK_GATEWAY_URL,
      logger: makeMockLogger(),
      fetchFn: gateway.fetchFn,
    });
    const controller = new AbortController();

    const pending = downloader.fetch(controller.signal, path, ENTRY);
    controller.abort();

    const err = await pending.catch((e: unknown) => e);
    expect(err instanceof Error && err.name).toBe("AbortError");
    release();
  });

  it("reports an unknown total when content-length is absent", async () => {
    const sink = makeSink();
    const fetchFn = vi.fn().mockResolvedValue(
      new Response(
        new ReadableStream<Uint8Array>({
          start(controller) {
            controller.enqueue(new Uint8Array(CONTENT));
            controller.close();
          },
        }),
        { status: 206 },
      ),
    );
    const downloader = createDownloader({
      gatewayUrl: MOCK_GATEWAY_URL,
      logger: makeMockLogger(),
      fetchFn,
      progress: () => sink,
    });

    await downloader.fetch(new AbortController().signal, path, ENTRY);

    expect(sink.start).toHaveBeenCalledWith(null, 0);
    expect(await readFile(path)).toEqual(CONTENT);
  });

  it("warns when the gateway ignores the range", async () => {
    await writeFile(path, CONTENT.subarray(0, 5));
    const logger = makeMockLogger();
    const fetchFn = vi
      .fn()
      .mockResolvedValue(new Response(new Uint8Array(CONTENT), { status: 200 }));
    const downloader = createDownloader({
      gatewayUrl: MOCK_GATEWAY_URL,
      logger,
      fetchFn,
    });

    await downloader.fetch(new AbortController().signal, path, ENTRY);

    expect(logger.warn).toHaveBeenCalledWith(
      { path, status: 200, offset: 5 },
      "Gateway ignored the range request; appending full content",
    );
    expect((await readFile(path)).length).toBe(25);
  });
});
