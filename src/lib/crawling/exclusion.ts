/**
 * Exclusion markers for repealed and reserved nodes
 */

export const DEFAULT_EXCLUSION_MARKERS = ['(REPEALED)', '(RESERVED)', 'RESERVED'];

/**
 * Case-insensitive substring predicate over the given markers
 */
export function createExclusionPredicate(markers: string[] = DEFAULT_EXCLUSION_MARKERS): (text: string) => boolean {
  const upper = markers.map((marker) => marker.toUpperCase());
  return (text: string) => {
    const candidate = text.toUpperCase();
    return upper.some((marker) => candidate.includes(marker));
  };
}
