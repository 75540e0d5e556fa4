import type { RankedOffer } from "../protocol.js";

export function formatOffersTable(offers: readonly RankedOffer[]): string {
  if (offers.length === 0) return "No flight options returned from miners.";

  const lines: string[] = [];
  lines.push(`Found **${offers.length}** offers:\n`);
  lines.push(
    "| # | Price | Carrier | Route | Market | Departure | Arrival | Duration | Stops | Miner |"
  );
  lines.push(
    "|---|-------|---------|-------|--------|-----------|---------|----------|-------|-------|"
  );

  for (let i = 0; i < offers.length; i++) {
    const o = offers[i];
    const price = `${o.price.toFixed(2)} ${o.currency}`;
    lines.push(
      `| ${i + 1} | **${price}** | ${o.carrier} | ${o.departureCity}→${o.arrivalCity} | ${o.market} | ${formatDateTime(o.departureTime)} | ${formatDateTime(o.arrivalTime)} | ${formatDuration(o.durationDays)} | ${o.stops} | ${shortKey(o.peerId)} |`
    );
  }

  return lines.join("\n");
}

export function formatScoresTable(scores: ReadonlyMap<string, number>): string {
  if (scores.size === 0) return "No scores recorded yet.";

  const rows = [...scores.entries()].sort((a, b) => b[1] - a[1]);
  const lines: string[] = [];
  lines.push("| # | Miner | Score |");
  lines.push("|---|-------|-------|");
  rows.forEach(([peerId, score], i) => {
    lines.push(`| ${i + 1} | ${peerId} | ${score} |`);
  });
  return lines.join("\n");
}

export function formatDateTime(iso: string): string {
  const d = new Date(iso);
  if (Number.isNaN(d.getTime())) return iso;
  return d.toISOString().replace("T", " ").slice(0, 16);
}

export function formatDuration(days: number): string {
  const minutes = Math.round(days * 24 * 60);
  const h = Math.floor(minutes / 60);
  const m = minutes % 60;
  return h > 0 ? `${h}h ${m}m` : `${m}m`;
}

function shortKey(key: string): string {
  return key.length > 12 ? `${key.slice(0, 6)}…${key.slice(-4)}` : key;
}
