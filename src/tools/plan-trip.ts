import { z } from "zod";
import { ConfigurationError } from "../utils/errors.js";
import type { RequestParser } from "../services/request-parser.js";
import { toTravelQuery } from "../services/request-parser.js";
import type { FlightSearch } from "../services/search.js";
import { formatSelection } from "../utils/formatting.js";

export const planTripSchema = z.object({
  message: z
    .string()
    .describe(
      "Travel request in plain language, e.g. 'Paris to Bangkok in January for 3 weeks, 2 adults, max 1 stop'"
    ),
});

export type PlanTripInput = z.infer<typeof planTripSchema>;

export async function handlePlanTrip(
  input: PlanTripInput,
  parser: RequestParser | null,
  search: FlightSearch
): Promise<string> {
  if (!parser) {
    throw new ConfigurationError("OPENAI_API_KEY is not configured");
  }
  const parsed = await parser.parse(input.message);
  const result = await search.search(toTravelQuery(parsed));

  return [
    "### Understood request",
    "```json",
    JSON.stringify(parsed, null, 2),
    "```",
    "",
    formatSelection(result),
  ].join("\n");
}
