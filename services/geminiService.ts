// services/geminiService.ts
import { GoogleGenAI, type GenerateContentResponse, type Part } from "@google/genai";
import type { ImageClient, NarrativeClient, VisionClient } from "../types";

export interface GeminiServiceOptions {
  apiKey: string;
  textModel: string;
  imageModel: string;
  timeoutMs: number;
}

/**
 * IMPORTANT:
 * Book pages carry their own captions, so every picture request hard-appends
 * this rule; otherwise the image model paints words into the scene.
 */
const NO_TEXT_RULE =
  "NO TEXT, NO LETTERS, NO WORDS, NO CAPTIONS, NO SPEECH BUBBLES, NO WATERMARKS. " +
  "The final image must contain ZERO readable text of any kind.";

function inlineImage(bytes: Buffer, mimeType = "image/png"): Part {
  return { inlineData: { data: bytes.toString("base64"), mimeType } };
}

/** First inline image in the response, as a data: URL. */
function imageDataUrl(response: GenerateContentResponse): string {
  for (const part of response.candidates?.[0]?.content?.parts ?? []) {
    const data = part.inlineData?.data;
    if (data) return `data:${part.inlineData?.mimeType ?? "image/png"};base64,${data}`;
  }
  throw new Error("No image returned");
}

/**
 * Gemini-backed implementation of every outbound AI call the pipeline makes.
 * The SDK client is created on first use so a missing key only fails the calls.
 */
export class GeminiService implements VisionClient, NarrativeClient, ImageClient {
  private ai: GoogleGenAI | null = null;

  constructor(private readonly opts: GeminiServiceOptions) {}

  private client(): GoogleGenAI {
    if (!this.ai) {
      if (!this.opts.apiKey) throw new Error("API_KEY not set");
      this.ai = new GoogleGenAI({
        apiKey: this.opts.apiKey,
        httpOptions: { timeout: this.opts.timeoutMs },
      });
    }
    return this.ai;
  }

  async describeImage(request: {
    image: Buffer;
    mimeType: string;
    prompt: string;
    maxOutputTokens: number;
  }): Promise<string> {
    const response = await this.client().models.generateContent({
      model: this.opts.textModel,
      contents: [
        {
          role: "user",
          parts: [{ text: request.prompt }, inlineImage(request.image, request.mimeType)],
        },
      ],
      config: {
        maxOutputTokens: request.maxOutputTokens,
        thinkingConfig: { thinkingBudget: 0 },
      },
    });
    const text = response.text?.trim();
    if (!text) throw new Error("Empty description returned");
    return text;
  }

  async generateJson(request: { system: string; prompt: string; temperature: number }): Promise<string> {
    const response = await this.client().models.generateContent({
      model: this.opts.textModel,
      contents: request.prompt,
      config: {
        systemInstruction: request.system,
        responseMimeType: "application/json",
        temperature: request.temperature,
      },
    });
    return response.text ?? "";
  }

  async generateImage(request: { prompt: string; size: number }): Promise<string> {
    const response = await this.client().models.generateContent({
      model: this.opts.imageModel,
      contents: [
        {
          role: "user",
          parts: [
            {
              text: `${request.prompt}\nCOMPOSITION: square 1:1 image, ${request.size}x${request.size}, full-bleed artwork.\n${NO_TEXT_RULE}`,
            },
          ],
        },
      ],
      config: { responseModalities: ["TEXT", "IMAGE"] },
    });
    return imageDataUrl(response);
  }

  async editImage(request: { image: Buffer; mimeType: string; mask: Buffer; prompt: string }): Promise<string> {
    const response = await this.client().models.generateContent({
      model: this.opts.imageModel,
      contents: [
        {
          role: "user",
          parts: [
            inlineImage(request.image, request.mimeType),
            { text: "BASE IMAGE: the picture to edit." },
            inlineImage(request.mask),
            {
              text: "EDIT MASK: same size as the base image. Only pixels that are transparent in this mask may change; everything else must stay identical.",
            },
            { text: `${request.prompt}\n${NO_TEXT_RULE}` },
          ],
        },
      ],
      config: { responseModalities: ["TEXT", "IMAGE"] },
    });
    return imageDataUrl(response);
  }
}
