import { existsSync, readFileSync } from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { STORY_PAGE_COUNT, type StorySelection, type SynthesisStory } from "../types";
import { ValidationError } from "./errors";
import { asText, isRecord } from "./jsonText";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_STORIES_FILE = path.resolve(__dirname, "../data/stories.json");

const BUNDLE_NAME = /^[A-Za-z0-9][A-Za-z0-9 _-]*$/;

function parseSynthesisStory(input: unknown, index: number): SynthesisStory {
  const entry: Record<string, unknown> = isRecord(input) ? input : {};
  const id = asText(entry.id);
  const title = asText(entry.title);
  const characterName = asText(entry.characterName);
  const scenes = Array.isArray(entry.scenes) ? entry.scenes.map(asText).filter(Boolean) : [];

  if (!id || !title || !characterName) {
    throw new Error(`Story catalog entry ${index} needs id, title and characterName`);
  }
  if (scenes.length !== STORY_PAGE_COUNT) {
    throw new Error(`Story "${id}" must list ${STORY_PAGE_COUNT} scenes, found ${scenes.length}`);
  }

  return { kind: "synthesis", id, title, characterName, plot: asText(entry.plot), scenes };
}

export function loadSynthesisStories(file = DEFAULT_STORIES_FILE): SynthesisStory[] {
  const raw: unknown = JSON.parse(readFileSync(file, "utf8"));
  if (!Array.isArray(raw)) throw new Error(`Story catalog ${file} must be a JSON array`);
  return raw.map(parseSynthesisStory);
}

export const TEMPLATE_CATALOG_FILE = "catalog.json";

/** One `TEMPLATES_DIR/catalog.json` entry: { id, title?, bundle? }; bundle defaults to id. */
export interface TemplateDeclaration {
  id: string;
  title: string;
  bundle: string;
}

function parseTemplateDeclaration(input: unknown, index: number): TemplateDeclaration {
  const entry: Record<string, unknown> = isRecord(input) ? input : {};
  const id = asText(entry.id);
  if (!id) throw new Error(`Template catalog entry ${index} needs an id`);
  const bundle = asText(entry.bundle) || id;
  if (!BUNDLE_NAME.test(bundle)) {
    throw new Error(`Template "${id}" has an invalid bundle name: ${bundle}`);
  }
  return { id, title: asText(entry.title) || id, bundle };
}

/** Declared template stories; a missing catalog file declares none. */
export function loadTemplateDeclarations(templatesDir: string): TemplateDeclaration[] {
  const file = path.join(templatesDir, TEMPLATE_CATALOG_FILE);
  if (!existsSync(file)) return [];
  const raw: unknown = JSON.parse(readFileSync(file, "utf8"));
  if (!Array.isArray(raw)) throw new Error(`Template catalog ${file} must be a JSON array`);
  return raw.map(parseTemplateDeclaration);
}

export interface StoryListing {
  id: string;
  title: string;
  kind: StorySelection["kind"];
}

/**
 * Resolves a story selector to one of the built-in synthesis stories or to a
 * template story declared in `templatesDir/catalog.json`. A declared template
 * resolves even when its bundle directory is gone; the job then fails at load.
 */
export class StoryCatalog {
  private readonly synthesis: Map<string, SynthesisStory>;

  constructor(
    private readonly templatesDir: string,
    stories: SynthesisStory[] = loadSynthesisStories()
  ) {
    this.synthesis = new Map(stories.map((s) => [s.id, s]));
  }

  resolve(selector: string): StorySelection {
    const id = selector.trim();
    const story = this.synthesis.get(id);
    if (story) return story;

    // re-read per call so bundles can be added without a restart
    const declared = loadTemplateDeclarations(this.templatesDir).find((t) => t.id === id);
    if (declared) {
      return {
        kind: "template",
        id: declared.id,
        title: declared.title,
        bundleDir: path.join(this.templatesDir, declared.bundle),
      };
    }
    throw new ValidationError("Invalid story type");
  }

  list(): StoryListing[] {
    const synthesis: StoryListing[] = [...this.synthesis.values()].map((s) => ({
      id: s.id,
      title: s.title,
      kind: s.kind,
    }));
    const templates = loadTemplateDeclarations(this.templatesDir).map(
      (t): StoryListing => ({ id: t.id, title: t.title, kind: "template" })
    );
    return [...synthesis, ...templates];
  }
}
