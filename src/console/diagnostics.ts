type MetricTags = Record<string, string | number | boolean | undefined>;

const counters = new Map<string, number>();

function metricKey(name: string, tags?: MetricTags): string {
  if (!tags || Object.keys(tags).length === 0) return name;
  const tagText = Object.entries(tags)
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${key}=${String(value)}`)
    .join(',');
  if (tagText.length === 0) return name;
  return `${name}|${tagText}`;
}

export function incConsoleMetric(name: string, tags?: MetricTags, amount = 1): void {
  if (amount <= 0) return;
  const key = metricKey(name, tags);
  counters.set(key, (counters.get(key) ?? 0) + amount);
}

export function getConsoleMetric(name: string, tags?: MetricTags): number {
  return counters.get(metricKey(name, tags)) ?? 0;
}

export function getConsoleMetricSnapshot(): Record<string, number> {
  return Object.fromEntries(counters.entries());
}

export function resetConsoleMetrics(): void {
  counters.clear();
}
