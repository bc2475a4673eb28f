import { beforeEach, describe, expect, it, vi } from "vitest";

const { generateContent } = vi.hoisted(() => ({ generateContent: vi.fn() }));

vi.mock("@google/genai", () => ({
  GoogleGenAI: class {
    models = { generateContent };
  },
}));

import { GeminiService } from "./geminiService";

const OPTS = { apiKey: "test-key", textModel: "text-model", imageModel: "image-model", timeoutMs: 1_000 };

function imageResponse(data: string, mimeType = "image/png") {
  return { candidates: [{ content: { parts: [{ text: "here you go" }, { inlineData: { data, mimeType } }] } }] };
}

beforeEach(() => {
  generateContent.mockReset();
});

describe("GeminiService.editImage", () => {
  it("labels the base image with its own mime type and the mask as png", async () => {
    generateContent.mockResolvedValue(imageResponse("QUJD"));
    const image = Buffer.from("jpeg-bytes");
    const mask = Buffer.from("mask-bytes");

    const url = await new GeminiService(OPTS).editImage({ image, mimeType: "image/jpeg", mask, prompt: "swap face" });

    expect(url).toBe("data:image/png;base64,QUJD");
    const [request] = generateContent.mock.calls[0];
    expect(request.model).toBe("image-model");
    const parts = request.contents[0].parts;
    expect(parts[0]).toEqual({ inlineData: { data: image.toString("base64"), mimeType: "image/jpeg" } });
    expect(parts[2]).toEqual({ inlineData: { data: mask.toString("base64"), mimeType: "image/png" } });
  });

  it("fails when no image comes back", async () => {
    generateContent.mockResolvedValue({ candidates: [{ content: { parts: [{ text: "no" }] } }] });
    await expect(
      new GeminiService(OPTS).editImage({
        image: Buffer.from("x"),
        mimeType: "image/png",
        mask: Buffer.from("m"),
        prompt: "p",
      })
    ).rejects.toThrow("No image returned");
  });
});

describe("GeminiService without a key", () => {
  it("fails the call instead of construction", async () => {
    const service = new GeminiService({ ...OPTS, apiKey: "" });
    await expect(service.generateImage({ prompt: "p", size: 32 })).rejects.toThrow("API_KEY not set");
    expect(generateContent).not.toHaveBeenCalled();
  });
});
