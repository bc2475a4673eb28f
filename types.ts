// types.ts

export type Gender = "Boy" | "Girl";

export const GENDERS: readonly Gender[] = ["Boy", "Girl"];

/** Short appearance summary re-injected into every illustration request. */
export type CharacterDescription = string;

export interface StoryPage {
  pageNumber: number; // 1-based
  sceneDescription: string;
  text: string; // 2-3 sentences shown under the picture

  // Synthesis stories only
  imagePrompt?: string;

  // Template stories only: absolute path of the page's template picture
  templateImage?: string;
}

export interface StoryCover {
  caption: string;
  templateImage: string;
}

export interface StoryOutline {
  title: string;
  subtitle?: string;
  cover?: StoryCover; // template stories carry a separate cover page
  pages: StoryPage[]; // always exactly STORY_PAGE_COUNT entries
}

export const STORY_PAGE_COUNT = 12;

/** One finished picture with its caption, in book order (cover = page 0). */
export interface PageArtifact {
  pageNumber: number;
  image: Buffer;
  caption: string;
}

/** A story the pipeline synthesises on demand. */
export interface SynthesisStory {
  kind: "synthesis";
  id: string;
  title: string;
  characterName: string;
  plot: string; // one-line plot hint used in the narrative prompt
  scenes: string[]; // fallback scene captions, {character_name} placeholder allowed
}

/** A story loaded from a pre-authored template bundle on disk. */
export interface TemplateStory {
  kind: "template";
  id: string;
  title: string;
  bundleDir: string; // may not exist; loading then fails the job
}

export type StorySelection = SynthesisStory | TemplateStory;

/**
 * Whole-record job state kept by the session store.
 * Every write replaces the record; createdAt is carried forward by the writer.
 */
export interface JobRecord {
  progress: number; // 0..100
  status: string;
  error: string | null;
  createdAt: number; // epoch ms
  completedAt: number | null;
  completed: boolean;
  artifactPath: string | null;
}

export interface JobStatusView {
  progress: number;
  status: string;
  error: string | null;
  completed: boolean;
}

// ---------------------------------------------------------------------------
// External collaborators
// ---------------------------------------------------------------------------

export interface VisionClient {
  describeImage(request: {
    image: Buffer;
    mimeType: string;
    prompt: string;
    maxOutputTokens: number;
  }): Promise<string>;
}

export interface NarrativeClient {
  /** Returns the raw model text; callers parse it. */
  generateJson(request: { system: string; prompt: string; temperature: number }): Promise<string>;
}

export interface ImageClient {
  /** Resolves to a fetchable resource (http(s) or data: URL). */
  generateImage(request: { prompt: string; size: number }): Promise<string>;
  /** The mask's transparent pixels mark the region that may change. */
  editImage(request: { image: Buffer; mimeType: string; mask: Buffer; prompt: string }): Promise<string>;
}
