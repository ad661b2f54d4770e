import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_CONFIG } from "../src/core/config.js";
import type { DiscoveryResult } from "../src/core/discovery.js";
import { runPipeline, type PipelineDeps, type RunOptions } from "../src/core/downloader.js";
import { HttpStatusError, PipelineError } from "../src/core/errors.js";
import { runFfmpeg } from "../src/core/ffmpeg.js";
import { resolveStreamUrls } from "../src/core/page-resolver.js";
import type { RetrievalTask } from "../src/core/retriever.js";
import { computeTransferProgress } from "../src/core/time.js";
import { fakeConcat } from "./fake-ffmpeg.js";

vi.mock("../src/core/ffmpeg.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../src/core/ffmpeg.js")>();
  return { ...actual, runFfmpeg: vi.fn() };
});

const PAGE = "https://www.mujrozhlas.cz/vinohradska-12/duch-na-zamku";
const MP3_1 = "https://croaod.cz/files/dil-1.mp3";
const MP3_2 = "https://croaod.cz/files/dil-2.mp3";
const MP3_3 = "https://croaod.cz/files/dil-3.mp3";

let root: string;

beforeEach(async () => {
  root = await mkdtemp(path.join(os.tmpdir(), "pipeline-test-"));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

function reporter() {
  return { info: vi.fn(), success: vi.fn(), warn: vi.fn() };
}

function resolvesTo(urls: string[]): PipelineDeps["resolve"] {
  return async () => ({ urls, discovery: null });
}

function fakeDownload(sizeFor: (task: RetrievalTask) => number | Error) {
  return vi.fn(async (task: RetrievalTask) => {
    const size = sizeFor(task);
    if (size instanceof Error) {
      throw size;
    }
    await writeFile(task.destination, Buffer.alloc(size, task.index));
    return computeTransferProgress(size, size, 10);
  });
}

function fakeConcatenate() {
  return vi.fn(async (_parts: string[], _output: string) => undefined);
}

function options(overrides: Partial<RunOptions> & { deps: Partial<PipelineDeps> }): RunOptions {
  return {
    inputUrl: PAGE,
    keepParts: false,
    config: DEFAULT_CONFIG,
    reporter: reporter(),
    cwd: root,
    ...overrides,
    deps: {
      hasFfmpeg: async () => true,
      makePartsDir: () => mkdtemp(path.join(root, "parts-")),
      ...overrides.deps,
    },
  };
}

describe("runPipeline", () => {
  it("hands only the surviving parts to the assembler, in discovery order", async () => {
    const concatenate = vi.fn(async (_parts: string[], output: string) => {
      await writeFile(output, "merged");
    });
    const downloadDirect = fakeDownload((task) =>
      task.index === 2 ? new HttpStatusError(404, "Not Found", task.url) : 2048,
    );
    const rep = reporter();

    const result = await runPipeline(
      options({
        reporter: rep,
        deps: { resolve: resolvesTo([MP3_1, MP3_2, MP3_3]), downloadDirect, concatenate },
      }),
    );

    expect(downloadDirect).toHaveBeenCalledTimes(3);
    expect(concatenate).toHaveBeenCalledTimes(1);
    expect(concatenate.mock.calls[0][0]).toEqual([
      path.join(result.partsDir, "01 part.mp3"),
      path.join(result.partsDir, "03 part.mp3"),
    ]);
    expect(result.outputPath).toBe(path.join(root, "duch-na-zamku.mp3"));
    expect(result.skipped).toEqual([
      { index: 2, url: MP3_2, reason: `HTTP error: HTTP 404 Not Found for ${MP3_2}` },
    ]);
    expect(rep.warn).toHaveBeenCalledWith(
      `[2] HTTP error: HTTP 404 Not Found for ${MP3_2}; skipping this URL.`,
    );
  });

  it("fails without merging when every retrieval fails", async () => {
    const concatenate = fakeConcatenate();
    const downloadDirect = fakeDownload(() => new TypeError("fetch failed"));

    const attempt = runPipeline(
      options({
        deps: { resolve: resolvesTo([MP3_1, MP3_2, MP3_3]), downloadDirect, concatenate },
      }),
    );
    await expect(attempt).rejects.toBeInstanceOf(PipelineError);
    await expect(attempt).rejects.toThrow("No parts downloaded/recorded successfully.");
    expect(concatenate).not.toHaveBeenCalled();
  });

  it("never forwards a part at or below the size floor", async () => {
    const concatenate = fakeConcatenate();
    const downloadDirect = fakeDownload((task) => (task.index === 1 ? 1024 : 1025));

    const result = await runPipeline(
      options({
        deps: { resolve: resolvesTo([MP3_1, MP3_2]), downloadDirect, concatenate },
      }),
    );

    expect(concatenate.mock.calls[0][0]).toEqual([path.join(result.partsDir, "02 part.mp3")]);
    expect(result.skipped).toEqual([
      { index: 1, url: MP3_1, reason: "output too small (1024 bytes)" },
    ]);
  });

  it("skips a URL whose retrieval left no file behind", async () => {
    const concatenate = fakeConcatenate();
    const recordAdaptive = vi.fn(async () => undefined);
    const downloadDirect = fakeDownload(() => 4096);

    const result = await runPipeline(
      options({
        deps: {
          resolve: resolvesTo(["https://croaod.cz/stream/aaa.m4a/manifest.mpd", MP3_1]),
          recordAdaptive,
          downloadDirect,
          concatenate,
        },
      }),
    );

    expect(recordAdaptive).toHaveBeenCalledTimes(1);
    expect(result.skipped.map((s) => s.reason)).toEqual(["output missing"]);
    expect(result.parts).toEqual([path.join(result.partsDir, "02 part.mp3")]);
  });

  it("skips URLs that are neither manifests nor MP3s", async () => {
    const concatenate = fakeConcatenate();
    const downloadDirect = fakeDownload(() => 4096);

    const result = await runPipeline(
      options({
        deps: {
          resolve: resolvesTo(["https://croaod.cz/about", MP3_1]),
          downloadDirect,
          concatenate,
        },
      }),
    );

    expect(downloadDirect).toHaveBeenCalledTimes(1);
    expect(result.skipped).toEqual([
      { index: 1, url: "https://croaod.cz/about", reason: "not a retrievable stream (unrelated)" },
    ]);
  });

  it("stops before resolving when ffmpeg is missing", async () => {
    const resolve = vi.fn(resolvesTo([MP3_1]));

    await expect(
      runPipeline(options({ deps: { hasFfmpeg: async () => false, resolve } })),
    ).rejects.toThrow('ffmpeg not found (tried "ffmpeg").');
    expect(resolve).not.toHaveBeenCalled();
  });

  it("fails with a hint when nothing was resolved", async () => {
    const makePartsDir = vi.fn(async () => root);

    const attempt = runPipeline(options({ deps: { resolve: resolvesTo([]), makePartsDir } }));
    await expect(attempt).rejects.toBeInstanceOf(PipelineError);
    await expect(attempt).rejects.toThrow("No croaod.cz .mpd/.mp3 streams detected.");
    expect(makePartsDir).not.toHaveBeenCalled();
  });

  it("writes to an explicit output path relative to the working directory", async () => {
    const concatenate = fakeConcatenate();

    const result = await runPipeline(
      options({
        outputPath: "out/final.mp3",
        deps: {
          resolve: resolvesTo([MP3_1]),
          downloadDirect: fakeDownload(() => 2048),
          concatenate,
        },
      }),
    );
    expect(result.outputPath).toBe(path.join(root, "out", "final.mp3"));
    expect(concatenate).toHaveBeenCalledWith(result.parts, result.outputPath, {
      ffmpegPath: "ffmpeg",
    });
  });

  it("downloads a direct MP3 URL into an identical output file", async () => {
    const audio = Uint8Array.from({ length: 5000 }, (_, i) => (i * 7) % 256);
    const fetchSpy = vi
      .spyOn(globalThis, "fetch")
      .mockResolvedValue(
        new Response(audio, { status: 200, headers: { "content-length": "5000" } }),
      );
    const input = "https://croaod.cz/files/porad/dil-7.mp3";

    const result = await runPipeline(options({ inputUrl: input, deps: {} }));

    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(fetchSpy.mock.calls[0][0]).toBe(input);
    expect(result.outputPath).toBe(path.join(root, "dil-7.mp3"));
    expect(await readFile(result.outputPath)).toEqual(Buffer.from(audio));
    expect(runFfmpeg).not.toHaveBeenCalled();
  });

  it("records every discovered manifest and merges them in discovery order", async () => {
    vi.mocked(runFfmpeg).mockImplementation(fakeConcat);
    const manifests = [
      "https://croaod.cz/stream/aaa.m4a/manifest.mpd",
      "https://croaod.cz/stream/bbb.m4a/manifest.mpd",
    ];
    const discover = vi.fn(
      async (): Promise<DiscoveryResult> => ({
        urls: manifests,
        observed: [],
        clicks: { clicked: 1, "not-found": 0, "timed-out": 0 },
        scrollRounds: 1,
      }),
    );
    const recordAdaptive = vi.fn(async (task: RetrievalTask) => {
      await writeFile(task.destination, Buffer.alloc(2048, task.index === 1 ? "a" : "b"));
    });

    const result = await runPipeline(
      options({
        deps: {
          resolve: (url, resolveOptions) =>
            resolveStreamUrls(url, { ...resolveOptions, discover }),
          recordAdaptive,
        },
      }),
    );

    expect(discover).toHaveBeenCalledTimes(1);
    expect(recordAdaptive.mock.calls.map(([task]) => [task.url, task.kind, task.referer])).toEqual([
      [manifests[0], "manifest", PAGE],
      [manifests[1], "manifest", PAGE],
    ]);
    const merged = await readFile(result.outputPath, "latin1");
    expect(merged).toBe(`${"a".repeat(2048)}${"b".repeat(2048)}`);
  });

  it("removes parts and their directory after a successful run", async () => {
    const result = await runPipeline(
      options({
        deps: {
          resolve: resolvesTo([MP3_1, MP3_2]),
          downloadDirect: fakeDownload(() => 2048),
          concatenate: async (_parts, output) => writeFile(output, "merged"),
        },
      }),
    );

    expect(result.parts).toHaveLength(2);
    for (const part of result.parts) {
      expect(existsSync(part)).toBe(false);
    }
    expect(existsSync(result.partsDir)).toBe(false);
  });

  it("leaves every part on disk with keepParts", async () => {
    const result = await runPipeline(
      options({
        keepParts: true,
        deps: {
          resolve: resolvesTo([MP3_1, MP3_2]),
          downloadDirect: fakeDownload(() => 2048),
          concatenate: async (_parts, output) => writeFile(output, "merged"),
        },
      }),
    );

    expect(result.parts).toEqual([
      path.join(result.partsDir, "01 part.mp3"),
      path.join(result.partsDir, "02 part.mp3"),
    ]);
    for (const part of result.parts) {
      expect((await readFile(part)).byteLength).toBe(2048);
    }
  });
});
