import type { CharacterDescription, VisionClient } from "../types";
import { errorMessage } from "./errors";
import { detectImageFormat } from "./imageTools";

export const FALLBACK_CHARACTER_DESCRIPTION = "a child with kind features";

const DESCRIBE_MAX_TOKENS = 200;

const DESCRIBE_PROMPT =
  "Describe this child's appearance in detail, including: hair color and style, eye color, " +
  "skin tone, facial features, and any distinctive characteristics. Be specific and consistent. " +
  "Format as: 'A [age]-year-old [gender] with [hair description], [eye color] eyes, " +
  "[skin tone], and [other features].'";

/**
 * Turns the uploaded photo into the description every illustration reuses.
 * Never throws: any failure yields FALLBACK_CHARACTER_DESCRIPTION.
 */
export class CharacterProfiler {
  constructor(private readonly vision: VisionClient) {}

  async describe(image: Buffer): Promise<CharacterDescription> {
    try {
      const { mimeType } = await detectImageFormat(image);
      const text = await this.vision.describeImage({
        image,
        mimeType,
        prompt: DESCRIBE_PROMPT,
        maxOutputTokens: DESCRIBE_MAX_TOKENS,
      });
      const description = text.replace(/\s+/g, " ").trim();
      return description || FALLBACK_CHARACTER_DESCRIPTION;
    } catch (e) {
      console.warn(`[profiler] Image analysis failed, using fallback description: ${errorMessage(e)}`);
      return FALLBACK_CHARACTER_DESCRIPTION;
    }
  }
}
