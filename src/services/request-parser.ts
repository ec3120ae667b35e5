import OpenAI from "openai";
import { z } from "zod";
import { UpstreamError, ValidationError, errorMessage } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";
import { addDays, isoDate, TravelClassSchema, type TravelQuery } from "./query.js";

/** Sends a system and a user message, returns the model's raw JSON text. */
export type CompleteJson = (system: string, user: string) => Promise<string>;

export function openAiCompleter(client: OpenAI, model: string): CompleteJson {
  return async (system, user) => {
    const resp = await client.chat.completions.create({
      model,
      temperature: 0,
      response_format: { type: "json_object" },
      messages: [
        { role: "system", content: system },
        { role: "user", content: user },
      ],
    });
    return resp.choices[0]?.message.content ?? "{}";
  };
}

const SYSTEM_PROMPT = [
  "You are a travel assistant.",
  "Extract round-trip flight search criteria from the user's message, whatever its language,",
  "and return ONLY a JSON object matching the schema below. No prose, no markdown.",
].join(" ");

const SCHEMA_TEXT = `{
  "originCity": "string (e.g. Paris)",
  "destinationCity": "string (e.g. Bangkok)",
  "period": { "start": "YYYY-MM-DD", "durationDays": "integer >= 1" },
  "departureDate": "YYYY-MM-DD",
  "returnDate": "YYYY-MM-DD",
  "passengers": { "adults": "integer >= 1", "children": "integer >= 0", "infants": "integer >= 0" },
  "maxStops": "integer 0..2",
  "budgetPerPax": "number >= 0"
}

Rules:
- Exact dates go in departureDate and returnDate.
- A period plus a length (e.g. "sometime in January, about 3 weeks") goes in period.start and period.durationDays.
- Omit fields the user did not mention. Do not explain anything outside the JSON.`;

function dropNulls(value: unknown): unknown {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return value;
  return Object.fromEntries(
    Object.entries(value)
      .filter(([, v]) => v !== null)
      .map(([k, v]) => [k, dropNulls(v)])
  );
}

// Models return numbers as strings often enough that everything is coerced.
const ExtractedSchema = z.preprocess(
  dropNulls,
  z.object({
    originCity: z.string().trim().min(1).optional(),
    destinationCity: z.string().trim().min(1).optional(),
    departureDate: isoDate.optional(),
    returnDate: isoDate.optional(),
    period: z
      .object({ start: isoDate, durationDays: z.coerce.number().int().min(1) })
      .optional(),
    passengers: z
      .object({
        adults: z.coerce.number().int().min(1).default(1),
        children: z.coerce.number().int().min(0).default(0),
        infants: z.coerce.number().int().min(0).default(0),
      })
      .default({}),
    maxStops: z.coerce.number().int().min(0).max(3).default(1),
    budgetPerPax: z.coerce.number().min(0).optional(),
    travelClass: TravelClassSchema.catch("ECONOMY").default("ECONOMY"),
  })
);

export type ParsedRequest = z.infer<typeof ExtractedSchema>;

/** Fills exact dates from a period when the model only gave the period. */
export function completeDates(parsed: ParsedRequest): ParsedRequest {
  if (!parsed.period || (parsed.departureDate && parsed.returnDate)) return parsed;
  return {
    ...parsed,
    departureDate: parsed.period.start,
    returnDate: addDays(parsed.period.start, parsed.period.durationDays),
  };
}

export function missingFields(parsed: ParsedRequest): string[] {
  const missing: string[] = [];
  if (!parsed.originCity) missing.push("originCity");
  if (!parsed.destinationCity) missing.push("destinationCity");
  if (!parsed.departureDate) missing.push("departureDate");
  if (!parsed.returnDate) missing.push("returnDate");
  return missing;
}

export function toTravelQuery(parsed: ParsedRequest): TravelQuery {
  const { originCity, destinationCity, departureDate, returnDate } = parsed;
  if (!originCity || !destinationCity || !departureDate || !returnDate) {
    throw new ValidationError(
      `Could not find ${missingFields(parsed).join(", ")} in the request`
    );
  }
  return {
    originCity,
    destinationCity,
    departureDate,
    returnDate,
    period: parsed.period,
    oneWay: false,
    passengers: parsed.passengers,
    maxStops: parsed.maxStops,
    budgetPerPax: parsed.budgetPerPax,
    travelClass: parsed.travelClass,
  };
}

export class RequestParser {
  private readonly complete: CompleteJson;
  private readonly logger: Logger;

  constructor(complete: CompleteJson, logger: Logger = silentLogger) {
    this.complete = complete;
    this.logger = logger;
  }

  async parse(message: string): Promise<ParsedRequest> {
    const text = message.trim();
    if (!text) throw new ValidationError("message is empty");

    let raw: string;
    try {
      raw = await this.complete(`${SYSTEM_PROMPT}\n\nExpected schema:\n${SCHEMA_TEXT}`, text);
    } catch (err) {
      throw new UpstreamError("OpenAI", 502, errorMessage(err));
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new UpstreamError("OpenAI", 502, "response was not valid JSON");
    }

    const parsed = ExtractedSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
      this.logger.warn("Model output rejected", { issues });
      throw new UpstreamError("OpenAI", 502, `unusable criteria (${issues.join("; ")})`);
    }

    return completeDates(parsed.data);
  }
}
