/**
 * In-process stand-ins and fixtures shared by the test files.
 */

import { existsSync } from "node:fs";
import { mkdir, mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import sharp from "sharp";
import type { ImageClient, NarrativeClient, VisionClient } from "../types";

export function tempDir(prefix = "storybook-test-"): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export function solidPng(size: number, color: string): Promise<Buffer> {
  return sharp({ create: { width: size, height: size, channels: 3, background: color } })
    .png()
    .toBuffer();
}

export function dataUrl(png: Buffer): string {
  return `data:image/png;base64,${png.toString("base64")}`;
}

export async function pixelAt(image: Buffer, x: number, y: number): Promise<number[]> {
  const { data, info } = await sharp(image).raw().toBuffer({ resolveWithObject: true });
  const o = (y * info.width + x) * info.channels;
  return [...data.subarray(o, o + info.channels)];
}

export function countPdfPages(pdf: Buffer): number {
  return pdf.toString("latin1").match(/\/Type \/Page\b/g)?.length ?? 0;
}

export class FakeVision implements VisionClient {
  readonly calls: Array<{ mimeType: string; maxOutputTokens: number }> = [];

  constructor(private readonly reply: string | Error) {}

  async describeImage(request: { mimeType: string; maxOutputTokens: number }): Promise<string> {
    this.calls.push({ mimeType: request.mimeType, maxOutputTokens: request.maxOutputTokens });
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

export class FakeNarrative implements NarrativeClient {
  readonly prompts: string[] = [];

  constructor(private readonly reply: string | Error) {}

  async generateJson(request: { prompt: string }): Promise<string> {
    this.prompts.push(request.prompt);
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

type ImageReply = string | Error;

export class FakeImages implements ImageClient {
  readonly generatePrompts: string[] = [];
  readonly edits: Array<{ image: Buffer; mimeType: string; mask: Buffer; prompt: string }> = [];

  constructor(
    private readonly generateReply: ImageReply,
    private readonly editReply: ImageReply = generateReply
  ) {}

  async generateImage(request: { prompt: string }): Promise<string> {
    this.generatePrompts.push(request.prompt);
    if (this.generateReply instanceof Error) throw this.generateReply;
    return this.generateReply;
  }

  async editImage(request: { image: Buffer; mimeType: string; mask: Buffer; prompt: string }): Promise<string> {
    this.edits.push(request);
    if (this.editReply instanceof Error) throw this.editReply;
    return this.editReply;
  }
}

/** JSON reply shaped like the outline model's output, with `count` pages. */
export function outlineReply(count: number, title = "Jack and the Beanstalk"): string {
  return JSON.stringify({
    story_title: title,
    pages: Array.from({ length: count }, (_, i) => ({
      page_number: i + 1,
      scene_description: `Scene ${i + 1}`,
      text: `Text for page ${i + 1}.`,
      image_prompt: `Scene ${i + 1}`,
    })),
  });
}

/** Adds an entry to templatesDir/catalog.json, creating the file when needed. */
export async function declareTemplate(templatesDir: string, id: string, title = "The Brave Knight"): Promise<void> {
  await mkdir(templatesDir, { recursive: true });
  const file = path.join(templatesDir, "catalog.json");
  const existing: unknown = existsSync(file) ? JSON.parse(await readFile(file, "utf8")) : [];
  const entries = Array.isArray(existing) ? existing : [];
  await writeFile(file, JSON.stringify([...entries, { id, title }]));
}

/**
 * Declares the story and writes story.json plus Cover.png and Page 1..12.png,
 * minus any names in `omit`. Names in `empty` are written as zero-byte files.
 */
export async function writeTemplateBundle(
  templatesDir: string,
  bundle: string,
  opts: { omit?: string[]; empty?: string[]; subtitle?: string } = {}
): Promise<string> {
  await declareTemplate(templatesDir, bundle);
  const dir = path.join(templatesDir, bundle);
  await mkdir(dir, { recursive: true });
  await writeFile(
    path.join(dir, "story.json"),
    JSON.stringify({
      title: "The Brave Knight",
      subtitle: opts.subtitle ?? "A story for {name}",
      pages: Array.from({ length: 12 }, (_, i) => `Template text ${i + 1}.`),
    })
  );

  const png = await solidPng(24, "#00ff00");
  const files = ["Cover.png", ...Array.from({ length: 12 }, (_, i) => `Page ${i + 1}.png`)];
  for (const file of files) {
    if (opts.omit?.includes(file)) continue;
    await writeFile(path.join(dir, file), opts.empty?.includes(file) ? Buffer.alloc(0) : png);
  }
  return dir;
}
