export function normalizeText(input: string | null | undefined): string {
  return (input || "").toLowerCase().replace(/\s+/g, " ").trim();
}

export function normalizeStage(input: string): string {
  // "Series A" / "series_a" / "Pre Seed" -> "series-a" / "pre-seed"
  return normalizeText(input).replace(/[\s_]+/g, "-");
}

export function tokenize(text: string): string[] {
  return normalizeText(text)
    .split(/[^a-z0-9]+/g)
    .filter(Boolean);
}

export function clampScore(n: number): number {
  if (!Number.isFinite(n)) return 0;
  return Math.max(0, Math.min(100, n));
}

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}
