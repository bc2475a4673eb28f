import sharp from "sharp";

export type UploadFormat = "png" | "jpeg" | "gif" | "webp";

export const UPLOAD_FORMATS: readonly UploadFormat[] = ["png", "jpeg", "gif", "webp"];

export const PLACEHOLDER_COLOR = "#ADD8E6"; // lightblue

function isUploadFormat(value: string | undefined): value is UploadFormat {
  return UPLOAD_FORMATS.some((f) => f === value);
}

/**
 * Decode just enough of the bytes to learn the encoded format.
 * Throws when the bytes are not an image, or not one of the upload formats.
 */
export async function detectImageFormat(
  bytes: Buffer
): Promise<{ format: UploadFormat; mimeType: string; width: number; height: number }> {
  const meta = await sharp(bytes).metadata();
  if (!isUploadFormat(meta.format)) {
    throw new Error(`Unsupported image format: ${meta.format ?? "unknown"}`);
  }
  return {
    format: meta.format,
    mimeType: `image/${meta.format}`,
    width: meta.width ?? 0,
    height: meta.height ?? 0,
  };
}

export function extensionFor(format: UploadFormat): string {
  return format === "jpeg" ? "jpg" : format;
}

/** Solid square stand-in used when a page cannot be illustrated. */
export function createPlaceholder(size: number, color = PLACEHOLDER_COLOR): Promise<Buffer> {
  return sharp({
    create: { width: size, height: size, channels: 3, background: color },
  })
    .png()
    .toBuffer();
}

/**
 * Flatten onto white and emit an sRGB PNG with no alpha channel.
 * When size is given the picture is also resized to a size×size square.
 */
export async function normalizeToRgb(bytes: Buffer, size?: number): Promise<Buffer> {
  let img = sharp(bytes).flatten({ background: "#ffffff" }).toColourspace("srgb");
  if (size) {
    img = img.resize(size, size, { fit: "fill", kernel: sharp.kernel.lanczos3 });
  }
  return img.removeAlpha().png().toBuffer();
}

export interface EllipseRegion {
  cx: number; // fractions of width/height
  cy: number;
  rx: number;
  ry: number;
}

/** Upper-centre guess at where a template character's face sits. */
export const FACE_REGION: EllipseRegion = { cx: 0.5, cy: 0.35, rx: 0.22, ry: 0.2 };

/**
 * Opaque RGBA canvas with a transparent ellipse: the transparent pixels are the
 * region an edit API may repaint.
 */
export function createEllipseMask(
  width: number,
  height: number,
  region: EllipseRegion = FACE_REGION
): Promise<Buffer> {
  const raw = Buffer.alloc(width * height * 4);
  const cx = region.cx * width;
  const cy = region.cy * height;
  const rx = region.rx * width;
  const ry = region.ry * height;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const dx = (x + 0.5 - cx) / rx;
      const dy = (y + 0.5 - cy) / ry;
      const o = (y * width + x) * 4;
      raw[o] = 0;
      raw[o + 1] = 0;
      raw[o + 2] = 0;
      raw[o + 3] = dx * dx + dy * dy <= 1 ? 0 : 255;
    }
  }

  return sharp(raw, { raw: { width, height, channels: 4 } }).png().toBuffer();
}
