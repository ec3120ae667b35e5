import { z } from "zod";
import type { IFlightProvider } from "../providers/provider.js";
import { findLocations } from "../services/locations.js";
import { formatLocations } from "../utils/formatting.js";

export const findLocationsSchema = z.object({
  keyword: z.string().describe("Start of a city or airport name, at least 2 characters"),
  limit: z.number().int().min(1).max(20).default(10).describe("Number of suggestions"),
});

export type FindLocationsInput = z.infer<typeof findLocationsSchema>;

export async function handleFindLocations(
  input: FindLocationsInput,
  provider: IFlightProvider
): Promise<string> {
  const locations = await findLocations(provider, input.keyword, input.limit);
  return formatLocations(locations);
}
