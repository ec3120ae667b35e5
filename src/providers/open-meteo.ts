import { endOfMonth, format, parseISO } from "date-fns";
import { z } from "zod";
import type { ClimateReading } from "../core/climate.js";
import { errorMessage } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";
import type { GeoPoint, IClimateProvider } from "./provider.js";

const GEOCODING_URL = "https://geocoding-api.open-meteo.com/v1/search";
const ARCHIVE_URL = "https://archive-api.open-meteo.com/v1/archive";

export interface OpenMeteoOptions {
  fetch?: typeof fetch;
  logger?: Logger;
  /** Year whose weather stands in for "typical" conditions of a month. */
  referenceYear?: number;
  language?: string;
}

const GeocodingSchema = z.object({
  results: z
    .array(
      z.object({
        name: z.string(),
        latitude: z.number(),
        longitude: z.number(),
        country_code: z.string().optional(),
      })
    )
    .optional(),
});

const ArchiveSchema = z.object({
  daily: z.object({
    temperature_2m_mean: z.array(z.number().nullable()).default([]),
    precipitation_sum: z.array(z.number().nullable()).default([]),
  }),
});

const EMPTY_READING: ClimateReading = { temperatureC: null, rainMm: null };

function present(values: readonly (number | null)[]): number[] {
  return values.filter((v): v is number => v !== null);
}

export function monthRange(year: number, month: number): { start: string; end: string } {
  const start = `${year}-${String(month).padStart(2, "0")}-01`;
  return { start, end: format(endOfMonth(parseISO(start)), "yyyy-MM-dd") };
}

/**
 * Geocoding and historical weather. Both lookups are best effort: a failure
 * yields null (or an empty reading) so a destination is still scored neutrally.
 */
export class OpenMeteoClient implements IClimateProvider {
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;
  private readonly referenceYear: number;
  private readonly language: string;

  constructor(options: OpenMeteoOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? silentLogger;
    this.referenceYear = options.referenceYear ?? 2023;
    this.language = options.language ?? "en";
  }

  async geocode(city: string): Promise<GeoPoint | null> {
    const query = new URLSearchParams({
      name: city,
      count: "1",
      language: this.language,
      format: "json",
    });
    try {
      const resp = await this.fetchImpl(`${GEOCODING_URL}?${query}`, {
        signal: AbortSignal.timeout(10_000),
      });
      if (!resp.ok) {
        this.logger.warn("Geocoding failed", { city, status: resp.status });
        return null;
      }
      const parsed = GeocodingSchema.safeParse(await resp.json());
      const hit = parsed.success ? parsed.data.results?.[0] : undefined;
      if (!hit) return null;
      return {
        name: hit.name,
        latitude: hit.latitude,
        longitude: hit.longitude,
        countryCode: hit.country_code,
      };
    } catch (err) {
      this.logger.warn("Geocoding failed", { city, error: errorMessage(err) });
      return null;
    }
  }

  /** Mean daily temperature and total precipitation for one month. */
  async monthlyClimate(latitude: number, longitude: number, month: number): Promise<ClimateReading> {
    const { start, end } = monthRange(this.referenceYear, month);
    const query = new URLSearchParams({
      latitude: String(latitude),
      longitude: String(longitude),
      start_date: start,
      end_date: end,
      daily: "temperature_2m_mean,precipitation_sum",
      timezone: "UTC",
    });
    try {
      const resp = await this.fetchImpl(`${ARCHIVE_URL}?${query}`, {
        signal: AbortSignal.timeout(12_000),
      });
      if (!resp.ok) {
        this.logger.warn("Climate lookup failed", { latitude, longitude, status: resp.status });
        return EMPTY_READING;
      }
      const parsed = ArchiveSchema.safeParse(await resp.json());
      if (!parsed.success) return EMPTY_READING;

      const temps = present(parsed.data.daily.temperature_2m_mean);
      const rain = present(parsed.data.daily.precipitation_sum);
      return {
        temperatureC: temps.length > 0 ? temps.reduce((a, b) => a + b, 0) / temps.length : null,
        rainMm: rain.length > 0 ? rain.reduce((a, b) => a + b, 0) : null,
      };
    } catch (err) {
      this.logger.warn("Climate lookup failed", {
        latitude,
        longitude,
        error: errorMessage(err),
      });
      return EMPTY_READING;
    }
  }
}
