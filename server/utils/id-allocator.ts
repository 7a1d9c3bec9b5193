/**
 * ID allocation for photos and collections.
 *
 * Deleted IDs are never reused and gaps are not filled. Two callers that read
 * the same snapshot will compute the same ID; nothing serializes them.
 */

export function nextId(entities: ReadonlyArray<{ id: number }>): number {
  if (entities.length === 0) return 1;
  return entities.reduce((max, e) => (e.id > max ? e.id : max), entities[0].id) + 1;
}
