/** Phrases that tend to signal overgeneralization or loaded framing. Order is reporting order. */
export const BIAS_MARKERS: readonly string[] = [
  'always',
  'never',
  'everyone knows',
  'obviously',
  'clearly',
  'undeniably',
  'without a doubt',
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const MARKER_PATTERNS = BIAS_MARKERS.map(
  (marker) => [marker, new RegExp(`\\b${escapeRegExp(marker)}\\b`, 'i')] as const,
);

export function findBiasMarkers(text: string): readonly string[] {
  return MARKER_PATTERNS.filter(([, pattern]) => pattern.test(text)).map(([marker]) => marker);
}
