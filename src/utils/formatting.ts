import type { OfferLite } from "../core/ranking.js";
import type { LocationSummary } from "../providers/provider.js";
import type { DiscoverResult, FollowUp } from "../services/discover.js";
import type { SearchResult } from "../services/search.js";

const SLOTS = [
  ["cheapest", "Cheapest"],
  ["recommended", "Recommended"],
  ["direct", "Direct"],
] as const;

function jsonBlock(value: unknown): string {
  return "```json\n" + JSON.stringify(value, null, 2) + "\n```";
}

export function formatDateTime(iso: string): string {
  if (!iso) return "-";
  // Provider timestamps are local times without an offset; keep them as given.
  return iso.replace("T", " ").slice(0, 16);
}

function formatPrice(amount: number, currency: string): string {
  return currency ? `${amount.toFixed(2)} ${currency}` : amount.toFixed(2);
}

function formatLegs(offer: OfferLite): string {
  return offer.legs
    .map((l) => `${l.from}→${l.to} ${formatDateTime(l.departure)}`)
    .join("<br>");
}

export function formatSelection(result: SearchResult): string {
  const s = result.meta.searched;
  const lines: string[] = [];
  const dates = s.returnDate ? `${s.departureDate} → ${s.returnDate}` : s.departureDate;
  lines.push(
    `## ${s.originCity} (${s.originLocationCode}) → ${s.destinationCity} (${s.destinationLocationCode}), ${dates}\n`
  );

  const { cheapest, recommended, direct } = result.results;
  if (!cheapest && !recommended && !direct) {
    lines.push(
      `No flights match these criteria (${result.meta.totalCandidates} offers found, none kept).`
    );
    return lines.join("\n");
  }

  lines.push("| Pick | Total | Per passenger | Duration | Stops | Carriers | Legs |");
  lines.push("|------|-------|---------------|----------|-------|----------|------|");
  for (const [key, label] of SLOTS) {
    const o = result.results[key];
    if (!o) {
      lines.push(`| ${label} | - | - | - | - | - | - |`);
      continue;
    }
    lines.push(
      `| ${label} | **${formatPrice(o.priceTotal, o.currency)}** | ${formatPrice(o.pricePerPax, o.currency)} | ${o.durationHhmm} | ${o.maxStops} | ${o.carriers.join(", ")} | ${formatLegs(o)} |`
    );
  }

  lines.push(
    `\nKept ${result.meta.kept} of ${result.meta.totalCandidates} offers (max ${s.maxStops} stops${
      s.budgetPerPax !== null ? `, budget ${s.budgetPerPax} per passenger` : ""
    }).\n`
  );
  lines.push(jsonBlock(result));
  return lines.join("\n");
}

export function formatDiscovery(result: DiscoverResult | FollowUp): string {
  if ("ask" in result) {
    return `${result.ask}\n\nMissing: ${result.need.join(", ")}`;
  }

  const q = result.query;
  const lines: string[] = [];
  const dates = q.returnDate ? `${q.departureDate} → ${q.returnDate}` : q.departureDate;
  lines.push(`## Where to go from ${q.originCity} (${q.originLocationCode}), ${dates}\n`);
  lines.push("| # | Destination | Score | Price | Per passenger | Climate | Popularity | Stops |");
  lines.push("|---|-------------|-------|-------|---------------|---------|------------|-------|");

  result.results.forEach((d, i) => {
    const temp =
      d.climate.temperatureC !== null ? ` (${d.climate.temperatureC.toFixed(1)}°C)` : "";
    lines.push(
      `| ${i + 1} | **${d.city}** (${d.locationCode}) | ${d.score.toFixed(4)} | ${formatPrice(d.offer.priceTotal, d.offer.currency)} | ${formatPrice(d.offer.pricePerPax, d.offer.currency)} | ${d.climateSuitability.toFixed(2)}${temp} | ${d.popularity.toFixed(2)} | ${d.offer.maxStops} |`
    );
  });

  lines.push(
    `\nScored ${result.meta.enriched} of ${result.meta.candidates} candidate destinations.\n`
  );
  lines.push(jsonBlock(result));
  return lines.join("\n");
}

export function formatLocations(locations: LocationSummary[]): string {
  if (locations.length === 0) return "No locations found.";

  const lines: string[] = [];
  lines.push("| Code | Name | City | Type |");
  lines.push("|------|------|------|------|");
  for (const l of locations) {
    lines.push(`| ${l.iataCode} | ${l.name} | ${l.cityName} | ${l.subType} |`);
  }
  return lines.join("\n");
}
