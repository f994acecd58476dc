import type { MediaCategory, PriorityOrder } from "../types.js";

const CATEGORY_KEYWORDS: ReadonlyArray<readonly [MediaCategory, readonly string[]]> = [
  ["audio", ["transcript", "audio"]],
  ["image", ["image", "photo", "fake"]],
  ["video", ["video", "clip", "mp4"]],
  ["document", ["doc", "file", "text"]],
];

export const FALLBACK_ORDER: PriorityOrder = ["document", "video", "image", "audio"];

/**
 * Categories the instructions mention come first, in keyword-table order;
 * the rest follow in {@link FALLBACK_ORDER}.
 */
export function parsePriorityOrder(instructions: string | undefined): PriorityOrder {
  const text = (instructions ?? "").toLowerCase();
  const order: MediaCategory[] = [];

  for (const [category, keywords] of CATEGORY_KEYWORDS) {
    if (keywords.some((keyword) => text.includes(keyword))) {
      order.push(category);
    }
  }
  for (const category of FALLBACK_ORDER) {
    if (!order.includes(category)) {
      order.push(category);
    }
  }
  return order;
}
