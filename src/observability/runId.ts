export function createRunId(now = new Date(), random: () => number = Math.random): string {
  const suffix = random().toString(36).slice(2, 8).padEnd(6, "0");
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}Z$/, "Z");
  return `extract_${stamp}_${suffix}`;
}
