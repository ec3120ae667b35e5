import type { IFlightProvider, LocationSummary } from "../providers/provider.js";

export const MIN_KEYWORD_LENGTH = 2;

/** City and airport suggestions; too-short keywords never reach the provider. */
export async function findLocations(
  provider: IFlightProvider,
  keyword: string,
  limit = 10
): Promise<LocationSummary[]> {
  const q = keyword.trim();
  if (q.length < MIN_KEYWORD_LENGTH) return [];
  const locations = await provider.searchLocations(q);
  return locations.slice(0, limit);
}
