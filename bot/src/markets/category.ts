import categoryData from './categories.json';

const TAG_MAP: ReadonlyMap<string, string> = new Map(Object.entries(categoryData.tags));
const PRIORITY: readonly string[] = categoryData.priority;

export const UNKNOWN_CATEGORY = 'Unknown';

/**
 * Maps venue tags to one category. Falls back to whole-word keyword matches in
 * the title; ties resolve by the priority list.
 */
export function extractCategory(tags: readonly string[], title: string): string {
  const found = new Set<string>();
  for (const tag of tags) {
    const mapped = TAG_MAP.get(tag.toLowerCase().trim());
    if (mapped) found.add(mapped);
  }

  if (found.size === 0) {
    const padded = ` ${title.toLowerCase().replace(/[^a-z0-9 ]+/g, ' ')} `;
    for (const [keyword, category] of TAG_MAP) {
      if (padded.includes(` ${keyword} `)) {
        found.add(category);
        break;
      }
    }
  }

  if (found.size === 0) return UNKNOWN_CATEGORY;
  return PRIORITY.find(c => found.has(c)) ?? [...found][0];
}
