import { z } from "zod";
import { climateSuitability, type ClimateReading } from "../core/climate.js";
import { rankOffers, toLite } from "../core/ranking.js";
import {
  scoreDestinations,
  type DestinationCandidate,
  type ScoredDestination,
} from "../core/scoring.js";
import type {
  IClimateProvider,
  IFlightProvider,
  InspirationCandidate,
} from "../providers/provider.js";
import { mapSettled } from "../utils/concurrency.js";
import { NotFoundError, UpstreamError, errorMessage } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";
import { filterOffers, passengerTotal, resolveDates, TripShape, type TripDates } from "./query.js";

export const DiscoverRequestSchema = z.object({
  originCity: z.string().trim().optional().describe("Departure city in plain text"),
  ...TripShape,
});

export type DiscoverRequest = z.infer<typeof DiscoverRequestSchema>;

/** Returned instead of results when the request lacks something only the user can supply. */
export interface FollowUp {
  ask: string;
  need: string[];
  mode: "discover";
}

export interface DiscoveredDestination extends DestinationCandidate {
  climateSuitability: number;
  popularity: number;
  climate: ClimateReading;
  countryCode: string | null;
}

export interface DiscoverResult {
  query: {
    originCity: string;
    originLocationCode: string;
    departureDate: string;
    returnDate: string | null;
    month: number;
    passengers: DiscoverRequest["passengers"];
    maxStops: number;
    budgetPerPax: number | null;
  };
  results: ScoredDestination<DiscoveredDestination>[];
  meta: { candidates: number; enriched: number };
}

export interface DiscoveryOptions {
  candidates: number;
  results: number;
  concurrency: number;
  offersPerCandidate?: number;
  logger?: Logger;
}

interface SearchContext {
  origin: string;
  dates: TripDates;
  month: number;
  request: DiscoverRequest;
}

export function isFollowUp(value: DiscoverResult | FollowUp): value is FollowUp {
  return "ask" in value;
}

export class DestinationDiscovery {
  private readonly flights: IFlightProvider;
  private readonly climate: IClimateProvider;
  private readonly options: DiscoveryOptions;
  private readonly logger: Logger;

  constructor(flights: IFlightProvider, climate: IClimateProvider, options: DiscoveryOptions) {
    this.flights = flights;
    this.climate = climate;
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  async discover(request: DiscoverRequest): Promise<DiscoverResult | FollowUp> {
    const originCity = request.originCity?.trim();
    if (!originCity) {
      return { ask: "Which city are you leaving from?", need: ["originCity"], mode: "discover" };
    }

    const hasDates =
      (request.departureDate && (request.returnDate || request.oneWay)) || request.period;
    if (!hasDates) {
      return {
        ask: "Do you prefer exact dates (outbound/return) or a start date plus a trip length?",
        need: ["departureDate/returnDate OR period.start + period.durationDays"],
        mode: "discover",
      };
    }

    const dates = resolveDates(request);
    const month = Number(dates.departureDate.split("-")[1]);
    const origin = await this.flights.cityToIata(originCity);

    const candidates = await this.flights.inspiration(
      origin,
      dates.departureDate,
      this.options.candidates
    );
    if (candidates.length === 0) {
      throw new UpstreamError(
        "Amadeus",
        502,
        "flight inspiration search returned nothing for this origin"
      );
    }

    const context: SearchContext = { origin, dates, month, request };
    const settled = await mapSettled(candidates, this.options.concurrency, (c) =>
      this.enrich(c, context)
    );

    const enriched: DiscoveredDestination[] = [];
    settled.forEach((result, i) => {
      if (result.status === "fulfilled") {
        if (result.value) enriched.push(result.value);
      } else {
        this.logger.warn("Skipped destination", {
          destination: candidates[i].destination,
          error: errorMessage(result.reason),
        });
      }
    });

    if (enriched.length === 0) {
      throw new NotFoundError("No destination matches these criteria.");
    }

    this.logger.info("Destinations scored", {
      origin,
      candidates: candidates.length,
      enriched: enriched.length,
    });

    return {
      query: {
        originCity,
        originLocationCode: origin,
        departureDate: dates.departureDate,
        returnDate: dates.returnDate ?? null,
        month,
        passengers: request.passengers,
        maxStops: request.maxStops,
        budgetPerPax: request.budgetPerPax ?? null,
      },
      results: scoreDestinations(enriched, { limit: this.options.results }),
      meta: { candidates: candidates.length, enriched: enriched.length },
    };
  }

  private async enrich(
    candidate: InspirationCandidate,
    context: SearchContext
  ): Promise<DiscoveredDestination | null> {
    const code = candidate.destination;
    const info = await this.flights.locationInfo(code);
    const city = info?.cityName || info?.name || code;
    const popularity = (info?.travelersScore ?? 50) / 100;

    const geo = await this.climate.geocode(city);
    const reading: ClimateReading = geo
      ? await this.climate.monthlyClimate(geo.latitude, geo.longitude, context.month)
      : { temperatureC: null, rainMm: null };

    const { request, dates } = context;
    const found = await this.flights.searchOffers({
      origin: context.origin,
      destination: code,
      departureDate: dates.departureDate,
      returnDate: dates.returnDate,
      adults: request.passengers.adults,
      children: request.passengers.children,
      infants: request.passengers.infants,
      max: this.options.offersPerCandidate ?? 30,
      travelClass: request.travelClass,
    });

    const pax = passengerTotal(request.passengers);
    const kept = filterOffers(found.offers, {
      maxStops: request.maxStops,
      budgetPerPax: request.budgetPerPax,
      passengers: pax,
    });
    const ranked = rankOffers(kept);
    const pick = ranked.cheapest ?? ranked.recommended ?? ranked.direct;
    if (!pick) {
      this.logger.debug("No offer left after filtering", { destination: code });
      return null;
    }

    return {
      city,
      locationCode: code,
      countryCode: geo?.countryCode ?? null,
      offer: toLite(pick, pax),
      climate: reading,
      climateSuitability: climateSuitability(reading),
      popularity,
    };
  }
}
