import { TravelQuerySchema, type TravelQuery } from "../services/query.js";
import type { FlightSearch } from "../services/search.js";
import { formatSelection } from "../utils/formatting.js";

export const searchFlightsSchema = TravelQuerySchema;

export async function handleSearchFlights(
  input: TravelQuery,
  search: FlightSearch
): Promise<string> {
  const result = await search.search(input);
  return formatSelection(result);
}
