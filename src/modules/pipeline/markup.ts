import { type LayoutBox } from "./pipeline.types";

export const PAGE_SEPARATOR = "\n\n<--- Page Split --->\n";

export type LayoutRef = {
  /** The full `<|ref|>…<|/ref|><|det|>…<|/det|>` span as it appears in the text. */
  raw: string;
  label: string;
  boxes: LayoutBox[];
};

const REF_PATTERN = /<\|ref\|>([\s\S]*?)<\|\/ref\|><\|det\|>([\s\S]*?)<\|\/det\|>/g;
const COORDINATE_PATTERN = /\[\s*(-?\d+(?:\.\d+)?)\s*,\s*(-?\d+(?:\.\d+)?)\s*,\s*(-?\d+(?:\.\d+)?)\s*,\s*(-?\d+(?:\.\d+)?)\s*\]/g;

function parseBoxes(label: string, coordinates: string): LayoutBox[] {
  const boxes: LayoutBox[] = [];
  for (const match of coordinates.matchAll(COORDINATE_PATTERN)) {
    const [x1, y1, x2, y2] = match.slice(1, 5).map(Number);
    boxes.push({ label, x1, y1, x2, y2 });
  }
  return boxes;
}

export function parseLayoutRefs(text: string): LayoutRef[] {
  const refs: LayoutRef[] = [];
  for (const match of text.matchAll(REF_PATTERN)) {
    const label = match[1].trim();
    refs.push({ raw: match[0], label, boxes: parseBoxes(label, match[2]) });
  }
  return refs;
}

export function imageName(pageIndex: number, imageIndex: number): string {
  return `${pageIndex}_${imageIndex}.jpg`;
}

/**
 * Replaces image references with markdown links to the cropped images and drops
 * every other grounding span. Image numbering follows box order on the page, so
 * it lines up with the crops the runner writes.
 */
export function toPrimaryText(text: string, pageIndex: number): string {
  let imageIndex = 0;
  let content = "";
  let cursor = 0;
  for (const match of text.matchAll(REF_PATTERN)) {
    const start = match.index ?? cursor;
    content += text.slice(cursor, start);
    cursor = start + match[0].length;
    const label = match[1].trim();
    if (label !== "image") {
      continue;
    }
    const boxCount = parseBoxes(label, match[2]).length;
    for (let n = 0; n < boxCount; n += 1) {
      content += `![](images/${imageName(pageIndex, imageIndex)})\n`;
      imageIndex += 1;
    }
  }
  content += text.slice(cursor);
  return content
    .replace(/\\coloneqq/g, ":=")
    .replace(/\\eqqcolon/g, "=:")
    .replace(/\n{3,}/g, "\n\n");
}
