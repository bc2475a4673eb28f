import { rm, writeFile } from "node:fs/promises";
import * as path from "node:path";
import sharp from "sharp";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  GenerationIllustrator,
  MaskedEditIllustrator,
  buildIllustrationPrompt,
  type IllustratorOptions,
} from "./pageIllustrator";
import { downloadImage } from "./retry";
import { FakeImages, dataUrl, pixelAt, solidPng, tempDir } from "./testSupport";

const DESC = "A 7-year-old girl with long black hair";

const OPTS: IllustratorOptions = {
  size: 32,
  timeoutMs: 5_000,
  download: { attempts: 3, baseDelayMs: 0 },
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("buildIllustrationPrompt", () => {
  it("caps the scene and character parts", () => {
    const prompt = buildIllustrationPrompt("a".repeat(500), "b".repeat(300), 3);
    expect(prompt).toBe(
      `${"a".repeat(400)}. Character: ${"b".repeat(200)}. Consistent character appearance, ` +
        "children's book illustration style, vibrant colors, square composition, page 3 of 12"
    );
  });
});

describe("GenerationIllustrator", () => {
  it("downloads and normalises the generated picture", async () => {
    const images = new FakeImages(dataUrl(await solidPng(16, "#ff0000")));
    const out = await new GenerationIllustrator(images, OPTS).illustrate(
      { pageNumber: 2, prompt: "Jack climbs the beanstalk" },
      DESC
    );

    const meta = await sharp(out).metadata();
    expect([meta.width, meta.height, meta.channels]).toEqual([32, 32, 3]);
    expect(await pixelAt(out, 16, 16)).toEqual([255, 0, 0]);
    expect(images.generatePrompts[0]).toBe(buildIllustrationPrompt("Jack climbs the beanstalk", DESC, 2));
  });

  it("uses the placeholder when generation fails", async () => {
    const out = await new GenerationIllustrator(new FakeImages(new Error("blocked")), OPTS).illustrate(
      { pageNumber: 1, prompt: "x" },
      DESC
    );
    expect(await pixelAt(out, 0, 0)).toEqual([173, 216, 230]);
  });

  it("uses the placeholder after every download attempt fails", async () => {
    const fetchMock = vi.fn().mockRejectedValue(new Error("socket hang up"));
    vi.stubGlobal("fetch", fetchMock);

    const out = await new GenerationIllustrator(new FakeImages("https://images.invalid/p1.png"), OPTS).illustrate(
      { pageNumber: 1, prompt: "x" },
      DESC
    );
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(await pixelAt(out, 31, 31)).toEqual([173, 216, 230]);
  });
});

describe("downloadImage", () => {
  it("retries until an attempt succeeds", async () => {
    const png = await solidPng(4, "#0000ff");
    const fetchMock = vi
      .fn()
      .mockRejectedValueOnce(new Error("reset"))
      .mockRejectedValueOnce(new Error("reset"))
      .mockResolvedValueOnce(new Response(new Blob([png])));
    vi.stubGlobal("fetch", fetchMock);
    const delays: number[] = [];

    const bytes = await downloadImage("https://images.invalid/a.png", {
      attempts: 3,
      baseDelayMs: 100,
      timeoutMs: 1_000,
      sleep: async (ms) => {
        delays.push(ms);
      },
    });

    expect(bytes.equals(png)).toBe(true);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([100, 200]);
  });

  it("treats a non-OK response as a failed attempt", async () => {
    vi.stubGlobal("fetch", vi.fn().mockImplementation(async () => new Response(null, { status: 503 })));
    await expect(
      downloadImage("https://images.invalid/a.png", { attempts: 2, baseDelayMs: 0, timeoutMs: 1_000 })
    ).rejects.toThrow("Image download failed (HTTP 503)");
  });

  it("aborts a stalled download after the timeout", async () => {
    const fetchMock = vi.fn(
      (_url: string, init?: { signal?: AbortSignal | null }) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          signal?.addEventListener("abort", () => reject(signal.reason));
        })
    );
    vi.stubGlobal("fetch", fetchMock);

    const err: unknown = await downloadImage("https://images.invalid/slow.png", {
      attempts: 2,
      baseDelayMs: 0,
      timeoutMs: 50,
    }).then(
      () => null,
      (e: unknown) => e
    );
    expect(err instanceof Error ? err.name : err).toBe("TimeoutError");
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[0][1]?.signal).toBeInstanceOf(AbortSignal);
  });

  it("reads data URLs", async () => {
    const png = await solidPng(4, "#ffffff");
    const bytes = await downloadImage(dataUrl(png), { attempts: 1, baseDelayMs: 0, timeoutMs: 1_000 });
    expect(bytes.equals(png)).toBe(true);
  });
});

describe("MaskedEditIllustrator", () => {
  it("sends the template with a mask of the same size", async () => {
    const dir = await tempDir();
    try {
      const templatePath = path.join(dir, "Page 1.png");
      await writeFile(templatePath, await solidPng(24, "#00ff00"));
      const images = new FakeImages("unused", dataUrl(await solidPng(24, "#0000ff")));

      const out = await new MaskedEditIllustrator(images, OPTS).illustrate(
        { pageNumber: 1, templateImage: templatePath },
        DESC
      );

      expect(await pixelAt(out, 0, 0)).toEqual([0, 0, 255]);
      expect(images.edits).toHaveLength(1);
      expect(images.edits[0].mimeType).toBe("image/png");
      const maskMeta = await sharp(images.edits[0].mask).metadata();
      expect([maskMeta.width, maskMeta.height]).toEqual([24, 24]);
      expect(images.edits[0].prompt).toContain(`the child described as ${DESC}`);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("keeps the template picture when the edit fails", async () => {
    const dir = await tempDir();
    try {
      const templatePath = path.join(dir, "Cover.png");
      await writeFile(templatePath, await solidPng(24, "#00ff00"));

      const out = await new MaskedEditIllustrator(new FakeImages(new Error("edit refused")), OPTS).illustrate(
        { pageNumber: 0, templateImage: templatePath },
        DESC
      );
      expect(await pixelAt(out, 12, 12)).toEqual([0, 255, 0]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("labels a jpeg template with its own mime type", async () => {
    const dir = await tempDir();
    try {
      const templatePath = path.join(dir, "Page 2.png");
      await writeFile(
        templatePath,
        await sharp({ create: { width: 24, height: 24, channels: 3, background: "#00ff00" } }).jpeg().toBuffer()
      );
      const images = new FakeImages("unused", dataUrl(await solidPng(24, "#0000ff")));

      await new MaskedEditIllustrator(images, OPTS).illustrate({ pageNumber: 2, templateImage: templatePath }, DESC);

      expect(images.edits.map((e) => e.mimeType)).toEqual(["image/jpeg"]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("returns the placeholder when the template picture cannot be read", async () => {
    const images = new FakeImages("unused");
    const out = await new MaskedEditIllustrator(images, OPTS).illustrate(
      { pageNumber: 4, templateImage: "/nonexistent/Page 4.png" },
      DESC
    );

    expect(await pixelAt(out, 0, 0)).toEqual([173, 216, 230]);
    expect(images.edits).toHaveLength(0);
  });

  it("returns the placeholder for an empty template file", async () => {
    const dir = await tempDir();
    try {
      const templatePath = path.join(dir, "Page 3.png");
      await writeFile(templatePath, Buffer.alloc(0));

      const out = await new MaskedEditIllustrator(new FakeImages("unused"), OPTS).illustrate(
        { pageNumber: 3, templateImage: templatePath },
        DESC
      );
      const meta = await sharp(out).metadata();
      expect([meta.width, meta.height]).toEqual([32, 32]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
