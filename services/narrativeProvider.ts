import { existsSync, statSync } from "node:fs";
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import {
  STORY_PAGE_COUNT,
  type Gender,
  type NarrativeClient,
  type StoryOutline,
  type StoryPage,
  type SynthesisStory,
  type TemplateStory,
} from "../types";
import { TemplateLoadError, errorMessage } from "./errors";
import { detectImageFormat } from "./imageTools";
import { asText, isRecord, parseJsonObject } from "./jsonText";

export interface NarrativeContext {
  gender: Gender;
  characterDescription: string;
  name?: string;
}

/** Supplies the 12-page outline for one job. */
export interface NarrativeProvider {
  /** Job status shown while the outline is being obtained. */
  readonly statusText: string;
  loadOutline(ctx: NarrativeContext): Promise<StoryOutline>;
}

// =============================================================================
// Outline repair
// =============================================================================

function continuationPage(pageNumber: number, characterDescription: string): StoryPage {
  return {
    pageNumber,
    sceneDescription: "Story continues",
    text: "The adventure continues...",
    imagePrompt: `${characterDescription}, children's book illustration`,
  };
}

function readPage(input: unknown, index: number, characterDescription: string): StoryPage {
  const p: Record<string, unknown> = isRecord(input) ? input : {};
  const n = p.page_number;
  const pageNumber = typeof n === "number" && Number.isInteger(n) && n > 0 ? n : index + 1;
  const sceneDescription = asText(p.scene_description);
  return {
    pageNumber,
    sceneDescription,
    text: asText(p.text),
    imagePrompt:
      asText(p.image_prompt) ||
      `${sceneDescription || "Story scene"}, featuring ${characterDescription}, children's book illustration`,
  };
}

/**
 * Coerce a model's outline into exactly STORY_PAGE_COUNT pages: extra pages are
 * dropped from the end, missing ones are appended as continuation pages.
 */
export function normalizeOutline(
  raw: Record<string, unknown>,
  fallbackTitle: string,
  characterDescription: string
): StoryOutline {
  if (!Array.isArray(raw.pages)) throw new Error("Invalid story structure");

  const pages = raw.pages
    .slice(0, STORY_PAGE_COUNT)
    .map((p, i) => readPage(p, i, characterDescription));
  while (pages.length < STORY_PAGE_COUNT) {
    pages.push(continuationPage(pages.length + 1, characterDescription));
  }

  return {
    title: asText(raw.story_title) || asText(raw.title) || fallbackTitle,
    pages,
  };
}

/** Built-in outline from the story's hand-written scene list. */
export function fallbackOutline(story: SynthesisStory, characterDescription: string): StoryOutline {
  const pages = story.scenes.slice(0, STORY_PAGE_COUNT).map((scene, i): StoryPage => {
    const sceneDescription = scene.replaceAll("{character_name}", story.characterName);
    return {
      pageNumber: i + 1,
      sceneDescription,
      text: `This is page ${i + 1} of the story.`,
      imagePrompt: `${sceneDescription}, featuring ${characterDescription}, children's book illustration style, vibrant colors`,
    };
  });
  while (pages.length < STORY_PAGE_COUNT) {
    pages.push(continuationPage(pages.length + 1, characterDescription));
  }
  return { title: story.title, pages };
}

// =============================================================================
// Synthesis strategy
// =============================================================================

const SYSTEM_PROMPT = "You are a children's story writer. Always return valid JSON only.";

function buildOutlinePrompt(story: SynthesisStory, gender: Gender, characterDescription: string): string {
  const hero = story.characterName;
  const child = gender === "Boy" ? "boy" : "girl";
  return `Create a ${STORY_PAGE_COUNT}-page children's story based on ${story.title}, starring ${hero} (a ${child} described as ${characterDescription}).

Structure it as a JSON object with:
- story_title: "${story.title}"
- pages: array of ${STORY_PAGE_COUNT} objects, each with:
  - page_number: 1-${STORY_PAGE_COUNT}
  - scene_description: brief scene description
  - text: 2-3 sentences for this page (child-friendly, age-appropriate)
  - image_prompt: detailed prompt for image generation maintaining consistent character appearance: ${characterDescription}

The story should:
- Page 1: Cover page with ${hero}
- Pages 2-${STORY_PAGE_COUNT - 1}: ${story.plot || "The adventure story"}
- Page ${STORY_PAGE_COUNT}: Happy ending

Return ONLY valid JSON, no markdown formatting.`;
}

export class SynthesisNarrative implements NarrativeProvider {
  readonly statusText = "Generating story outline...";

  constructor(
    private readonly story: SynthesisStory,
    private readonly client: NarrativeClient
  ) {}

  async loadOutline({ gender, characterDescription }: NarrativeContext): Promise<StoryOutline> {
    try {
      const text = await this.client.generateJson({
        system: SYSTEM_PROMPT,
        prompt: buildOutlinePrompt(this.story, gender, characterDescription),
        temperature: 0.7,
      });
      return normalizeOutline(parseJsonObject(text), this.story.title, characterDescription);
    } catch (e) {
      console.warn(`[narrative] Outline generation failed for "${this.story.id}", using built-in scenes: ${errorMessage(e)}`);
      return fallbackOutline(this.story, characterDescription);
    }
  }
}

// =============================================================================
// Template strategy
// =============================================================================

export const TEMPLATE_STORY_FILE = "story.json";
export const TEMPLATE_COVER_IMAGE = "Cover.png";
export const NAME_PLACEHOLDER = "{name}";

export function templatePageImage(pageNumber: number): string {
  return `Page ${pageNumber}.png`;
}

function requireFile(bundleDir: string, file: string, what: string): string {
  const full = path.join(bundleDir, file);
  if (!existsSync(full) || !statSync(full).isFile()) {
    throw new TemplateLoadError(`Template ${what} not found: ${file}`);
  }
  return full;
}

/** Like requireFile, and the picture must also decode. */
async function requireImage(bundleDir: string, file: string, what: string): Promise<string> {
  const full = requireFile(bundleDir, file, what);
  try {
    await detectImageFormat(await readFile(full));
  } catch (e) {
    throw new TemplateLoadError(`Template ${what} is not a valid image: ${file} (${errorMessage(e)})`);
  }
  return full;
}

/**
 * Loads a pre-authored story bundle:
 *   story.json  { title, subtitle, pages: string[12] }
 *   Cover.png, Page 1.png … Page 12.png
 * Any missing or undecodable piece fails the job.
 */
export class TemplateNarrative implements NarrativeProvider {
  readonly statusText = "Loading story...";

  constructor(private readonly story: TemplateStory) {}

  async loadOutline({ name }: NarrativeContext): Promise<StoryOutline> {
    const { bundleDir, id } = this.story;
    if (!existsSync(bundleDir) || !statSync(bundleDir).isDirectory()) {
      throw new TemplateLoadError(`Template bundle not found: ${id}`);
    }
    const childName = name?.trim();
    if (!childName) throw new TemplateLoadError(`Template story "${id}" needs a name`);

    const storyFile = requireFile(bundleDir, TEMPLATE_STORY_FILE, "story file");
    let meta: unknown;
    try {
      meta = JSON.parse(await readFile(storyFile, "utf8"));
    } catch (e) {
      throw new TemplateLoadError(`Template story file is not valid JSON (${id}): ${errorMessage(e)}`);
    }
    if (!isRecord(meta)) throw new TemplateLoadError(`Template story file must be an object (${id})`);

    const texts = Array.isArray(meta.pages) ? meta.pages.map(asText) : [];
    if (texts.length !== STORY_PAGE_COUNT) {
      throw new TemplateLoadError(
        `Template "${id}" must have ${STORY_PAGE_COUNT} pages, found ${texts.length}`
      );
    }

    const title = asText(meta.title) || this.story.title;
    const subtitle = asText(meta.subtitle).replaceAll(NAME_PLACEHOLDER, childName);

    const cover = {
      caption: subtitle ? `${title}\n${subtitle}` : title,
      templateImage: await requireImage(bundleDir, TEMPLATE_COVER_IMAGE, "cover"),
    };

    const pages: StoryPage[] = [];
    for (const [i, text] of texts.entries()) {
      pages.push({
        pageNumber: i + 1,
        sceneDescription: `Page ${i + 1}`,
        text,
        templateImage: await requireImage(bundleDir, templatePageImage(i + 1), "page"),
      });
    }

    return { title, subtitle, cover, pages };
  }
}
