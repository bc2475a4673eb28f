import { createWriteStream } from "node:fs";
import { finished } from "node:stream/promises";
import PDFDocument from "pdfkit";
import sharp from "sharp";

// 8.5in square at 72pt per inch
export const PAGE_SIZE = 612;

export const CAPTION_BAND_HEIGHT = 120;
export const CAPTION_FONT = "Helvetica-Bold";
export const CAPTION_FONT_SIZE = 18;
export const CAPTION_MARGIN = 20;
export const CAPTION_MAX_WIDTH = PAGE_SIZE - CAPTION_MARGIN * 2;
export const MAX_CAPTION_LINES = 4;
export const MAX_LINE_CHARS = 80;

const LINE_PITCH = 28;
const LAST_BASELINE_FROM_BOTTOM = 30;
const CAPTION_COLOR = "#1a1a1a";

export type MeasureText = (text: string) => number;

export interface ComposedPage {
  image: Buffer;
  caption: string;
}

function wrapParagraph(text: string, measure: MeasureText, maxWidth: number): string[] {
  const words = text.trim().split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let line = "";

  for (const w of words) {
    const test = line ? `${line} ${w}` : w;
    if (measure(test) < maxWidth) {
      line = test;
    } else {
      if (line) lines.push(line);
      line = w;
    }
  }
  if (line) lines.push(line);
  return lines;
}

/**
 * Word-wrap a caption by measured width. Each "\n" starts a new paragraph that
 * is wrapped on its own; blank paragraphs produce no lines.
 */
export function wrapCaption(text: string, measure: MeasureText, maxWidth: number): string[] {
  return text.split(/\r?\n/).flatMap((paragraph) => wrapParagraph(paragraph, measure, maxWidth));
}

/** The lines that actually get drawn: the last four, each capped in length. */
export function captionLinesToRender(lines: string[]): string[] {
  return lines
    .filter((l) => l.trim())
    .slice(-MAX_CAPTION_LINES)
    .map((l) => l.slice(0, MAX_LINE_CHARS));
}

async function fitToPage(image: Buffer): Promise<Buffer> {
  return sharp(image)
    .flatten({ background: "#ffffff" })
    .resize(PAGE_SIZE, PAGE_SIZE, { fit: "fill", kernel: sharp.kernel.lanczos3 })
    .png()
    .toBuffer();
}

function drawCaption(doc: PDFKit.PDFDocument, caption: string): void {
  doc.rect(0, PAGE_SIZE - CAPTION_BAND_HEIGHT, PAGE_SIZE, CAPTION_BAND_HEIGHT).fill("#ffffff");

  doc.font(CAPTION_FONT).fontSize(CAPTION_FONT_SIZE).fillColor(CAPTION_COLOR);
  const lines = captionLinesToRender(
    wrapCaption(caption, (s) => doc.widthOfString(s), CAPTION_MAX_WIDTH)
  );

  lines.forEach((line, i) => {
    const baseline = PAGE_SIZE - LAST_BASELINE_FROM_BOTTOM - (lines.length - 1 - i) * LINE_PITCH;
    doc.text(line, CAPTION_MARGIN, baseline - CAPTION_FONT_SIZE, { lineBreak: false });
  });
}

/**
 * Write one square, full-bleed page per entry, in the given order.
 * Pages with an empty caption get no caption band.
 */
export async function composeDocument(pages: ComposedPage[], outputPath: string): Promise<number> {
  if (pages.length === 0) throw new Error("Cannot compose a document without pages");

  const fitted = await Promise.all(pages.map((p) => fitToPage(p.image)));

  const doc = new PDFDocument({ autoFirstPage: false, margin: 0, size: [PAGE_SIZE, PAGE_SIZE] });
  const out = createWriteStream(outputPath);
  doc.pipe(out);

  pages.forEach((page, i) => {
    doc.addPage({ size: [PAGE_SIZE, PAGE_SIZE], margin: 0 });
    doc.image(fitted[i], 0, 0, { width: PAGE_SIZE, height: PAGE_SIZE });
    if (page.caption.trim()) drawCaption(doc, page.caption);
  });

  doc.end();
  await finished(out);
  return pages.length;
}
