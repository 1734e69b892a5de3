// Hosting services treat label names case-insensitively.
export function normalizeLabel(label: string): string {
  return label.trim().toLowerCase();
}

export function hasLabel(labels: readonly string[], label: string): boolean {
  const wanted = normalizeLabel(label);
  return labels.some((l) => normalizeLabel(l) === wanted);
}

export function hasAnyLabel(labels: readonly string[], candidates: readonly string[]): boolean {
  if (candidates.length === 0) return false;
  const set = new Set(labels.map(normalizeLabel));
  return candidates.some((c) => set.has(normalizeLabel(c)));
}

/** Accepts `["a", "b"]` or the comma-separated form `"a, b"`. */
export function parseLabelList(value: string | readonly string[]): string[] {
  const items = typeof value === "string" ? value.split(",") : value;
  return items.map((l) => l.trim()).filter((l) => l.length > 0);
}
