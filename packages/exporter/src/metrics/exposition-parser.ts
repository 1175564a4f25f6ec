/**
 * Reader for the Prometheus text exposition format.
 *
 * Used by the container health check script (which scrapes our own
 * /metrics endpoint) and by tests asserting on rendered snapshots.
 * Only unlabelled samples are needed here; labelled ones are kept under
 * their full `name{...}` key.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Sample values keyed by metric name (including any label set) */
export type ExpositionSample = Map<string, number>;

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/**
 * Matches sample lines like:
 *   arpwatch_new_station_total 42
 *   nodejs_heap_space_size_total_bytes{space="old"} 1.2e+07 1700000000000
 *
 * Captures: [1] = name with labels, [2] = value
 */
const SAMPLE_RE = /^([a-zA-Z_:][a-zA-Z0-9_:]*(?:\{[^}]*\})?)\s+(\S+)/;

/** Parse exposition text into sample values. Comments and blank lines are skipped. */
export function parseExposition(text: string): ExpositionSample {
  const samples: ExpositionSample = new Map();

  for (const line of text.split("\n")) {
    if (line === "" || line.startsWith("#")) continue;
    const match = SAMPLE_RE.exec(line);
    if (!match) continue;

    const value = parseValue(match[2]);
    if (value === null) continue;
    samples.set(match[1], value);
  }

  return samples;
}

function parseValue(raw: string): number | null {
  switch (raw) {
    case "+Inf":
      return Number.POSITIVE_INFINITY;
    case "-Inf":
      return Number.NEGATIVE_INFINITY;
    case "NaN":
      return Number.NaN;
  }
  const value = Number(raw);
  return Number.isNaN(value) ? null : value;
}

// ---------------------------------------------------------------------------
// Scraper
// ---------------------------------------------------------------------------

const WILDCARD_HOSTS: Record<string, string> = {
  "0.0.0.0": "127.0.0.1",
  "::": "::1",
};

/**
 * URL of the local /metrics endpoint for a listen address. Wildcard
 * binds map to loopback; IPv6 literals get brackets.
 */
export function localMetricsUrl(host: string, port: number): string {
  const target = WILDCARD_HOSTS[host] ?? host;
  const authority = target.includes(":") && !target.startsWith("[") ? `[${target}]` : target;
  return `http://${authority}:${port}/metrics`;
}

/**
 * Fetch a metrics endpoint and parse it.
 * Rejects on network errors and non-2xx responses so the caller can
 * tell "endpoint down" from "metric missing".
 */
export async function scrapeMetrics(url: string, timeoutMs = 5_000): Promise<ExpositionSample> {
  const res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  if (!res.ok) {
    throw new Error(`Metrics endpoint returned HTTP ${res.status}`);
  }
  return parseExposition(await res.text());
}
