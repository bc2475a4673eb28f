import { readFile } from "node:fs/promises";
import * as path from "node:path";
import { STORY_PAGE_COUNT, type ImageClient } from "../types";
import { errorMessage } from "./errors";
import { createEllipseMask, createPlaceholder, detectImageFormat, normalizeToRgb } from "./imageTools";
import { downloadImage, type RetryOptions } from "./retry";

export const IMAGE_SIZE = 1024;

const MAX_SCENE_PROMPT = 400;
const MAX_CHARACTER_PROMPT = 200;
const MAX_IMAGE_PROMPT = 1000;

/** One picture to produce; exactly one of prompt / templateImage is used per strategy. */
export interface IllustrationTask {
  pageNumber: number; // 0 = cover
  prompt?: string;
  templateImage?: string;
}

export interface PageIllustrator {
  /** Always resolves to an sRGB PNG; failures degrade to a fallback picture. */
  illustrate(task: IllustrationTask, characterDescription: string): Promise<Buffer>;
}

export interface IllustratorOptions {
  size: number;
  timeoutMs: number;
  download: RetryOptions;
}

export const DEFAULT_ILLUSTRATOR_OPTIONS: IllustratorOptions = {
  size: IMAGE_SIZE,
  timeoutMs: 30_000,
  download: { attempts: 3, baseDelayMs: 1000 },
};

export function buildIllustrationPrompt(
  scenePrompt: string,
  characterDescription: string,
  pageNumber: number
): string {
  const scene = scenePrompt.slice(0, MAX_SCENE_PROMPT);
  const character = characterDescription.slice(0, MAX_CHARACTER_PROMPT);
  const prompt =
    `${scene}. Character: ${character}. Consistent character appearance, ` +
    `children's book illustration style, vibrant colors, square composition, ` +
    `page ${pageNumber} of ${STORY_PAGE_COUNT}`;
  return prompt.slice(0, MAX_IMAGE_PROMPT);
}

// =============================================================================
// Generation strategy
// =============================================================================

export class GenerationIllustrator implements PageIllustrator {
  constructor(
    private readonly images: ImageClient,
    private readonly opts: IllustratorOptions = DEFAULT_ILLUSTRATOR_OPTIONS
  ) {}

  async illustrate(task: IllustrationTask, characterDescription: string): Promise<Buffer> {
    const { size } = this.opts;
    try {
      const prompt = buildIllustrationPrompt(task.prompt ?? "", characterDescription, task.pageNumber);
      const url = await this.images.generateImage({ prompt, size });
      const bytes = await downloadImage(url, { ...this.opts.download, timeoutMs: this.opts.timeoutMs });
      return await normalizeToRgb(bytes, size);
    } catch (e) {
      console.warn(`[illustrator] Page ${task.pageNumber} image failed, using placeholder: ${errorMessage(e)}`);
      return createPlaceholder(size);
    }
  }
}

// =============================================================================
// Masked-edit strategy
// =============================================================================

export function buildEditPrompt(characterDescription: string): string {
  const character = characterDescription.slice(0, MAX_CHARACTER_PROMPT);
  return (
    `Repaint only the transparent region of the mask: replace the child's face with the child described as ${character}. ` +
    "Preserve this child's identity exactly (hair, eyes, skin tone, distinctive features). " +
    "Keep the pose, clothing, lighting, background and illustration style of the original picture unchanged. " +
    "Do not add any text."
  );
}

/**
 * Paints the child into a template picture through a masked edit. Never
 * throws: a failed edit returns the template picture as-is, and a template
 * that cannot be read or decoded falls back to the placeholder.
 */
export class MaskedEditIllustrator implements PageIllustrator {
  constructor(
    private readonly images: ImageClient,
    private readonly opts: IllustratorOptions = DEFAULT_ILLUSTRATOR_OPTIONS
  ) {}

  async illustrate(task: IllustrationTask, characterDescription: string): Promise<Buffer> {
    const label = task.templateImage ? path.basename(task.templateImage) : `page ${task.pageNumber}`;
    let template: Buffer | null = null;

    try {
      if (!task.templateImage) throw new Error(`Page ${task.pageNumber} has no template image`);
      template = await readFile(task.templateImage);
      const { width, height, mimeType } = await detectImageFormat(template);
      const mask = await createEllipseMask(width, height);
      const url = await this.images.editImage({
        image: template,
        mimeType,
        mask,
        prompt: buildEditPrompt(characterDescription),
      });
      const edited = await downloadImage(url, { ...this.opts.download, timeoutMs: this.opts.timeoutMs });
      return await normalizeToRgb(edited);
    } catch (e) {
      console.warn(`[illustrator] Edit of ${label} failed, keeping template: ${errorMessage(e)}`);
      return this.unedited(template, label);
    }
  }

  private async unedited(template: Buffer | null, label: string): Promise<Buffer> {
    if (template) {
      try {
        return await normalizeToRgb(template);
      } catch (e) {
        console.warn(`[illustrator] Template ${label} is unreadable, using placeholder: ${errorMessage(e)}`);
      }
    }
    return createPlaceholder(this.opts.size);
  }
}
