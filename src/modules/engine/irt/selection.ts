import type { ItemTemplate } from "@adaptest/lib/types";
import { fisherInformation } from "./model";

function byId(a: ItemTemplate, b: ItemTemplate): number {
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

/** Select the most informative item at the current theta.
 * Ties go to the lowest item id so that identical inputs always pick the same item.
 * Returns null when every item in the pool has been administered.
 */
export function selectNextItem(
  pool: readonly ItemTemplate[],
  administeredIds: ReadonlySet<string>,
  theta: number,
): ItemTemplate | null {
  let bestItem: ItemTemplate | null = null;
  let bestInfo = Number.NEGATIVE_INFINITY;

  for (const item of pool) {
    if (administeredIds.has(item.id)) continue;
    const info = fisherInformation(item.parameter, theta);
    if (info > bestInfo || (info === bestInfo && bestItem !== null && item.id < bestItem.id)) {
      bestInfo = info;
      bestItem = item;
    }
  }

  return bestItem;
}

/** Rank items by Fisher information (descending, then by id) */
export function rankItemsByInformation(
  pool: readonly ItemTemplate[],
  theta: number,
): ItemTemplate[] {
  return [...pool].sort((a, b) => {
    const diff = fisherInformation(b.parameter, theta) - fisherInformation(a.parameter, theta);
    return diff !== 0 ? diff : byId(a, b);
  });
}

/** Filter items by topic (case-insensitive, surrounding whitespace ignored) */
export function filterItemsByTopic(pool: readonly ItemTemplate[], topic: string): ItemTemplate[] {
  const wanted = topic.trim().toLowerCase();
  return pool.filter((item) => item.metadata.topic.trim().toLowerCase() === wanted);
}
