import type { Itinerary, Offer, Segment } from "../src/core/offer.js";
import type {
  GeoPoint,
  IClimateProvider,
  IFlightProvider,
  InspirationCandidate,
  LocationSummary,
  OfferSearchParams,
  OfferSearchResult,
} from "../src/providers/provider.js";
import type { ClimateReading } from "../src/core/climate.js";
import { ValidationError } from "../src/utils/errors.js";

export function seg(
  from: string,
  to: string,
  carrierCode = "AF",
  departure = "2026-01-10T08:00:00",
  arrival = "2026-01-10T12:00:00"
): Segment {
  return {
    carrierCode,
    number: "100",
    departure: { iataCode: from, at: departure },
    arrival: { iataCode: to, at: arrival },
  };
}

export function itin(duration: string, ...segments: Segment[]): Itinerary {
  return { duration, segments };
}

export function offer(id: string, priceTotal: number, ...itineraries: Itinerary[]): Offer {
  return { id, priceTotal, currency: "EUR", itineraries };
}

/** A one-way offer with `stops` connections through FRA. */
export function simpleOffer(id: string, priceTotal: number, stops: number, duration: string): Offer {
  const segments = [seg("CDG", stops === 0 ? "BKK" : "FRA")];
  for (let i = 0; i < stops; i++) {
    segments.push(seg("FRA", i === stops - 1 ? "BKK" : "FRA", "LH"));
  }
  return offer(id, priceTotal, itin(duration, ...segments));
}

export class FakeFlightProvider implements IFlightProvider {
  readonly name = "fake";
  readonly searches: OfferSearchParams[] = [];
  cities: Record<string, string> = {};
  locations: Record<string, LocationSummary> = {};
  offersByDestination: Record<string, Offer[] | Error> = {};
  candidates: InspirationCandidate[] = [];

  isAvailable(): boolean {
    return true;
  }

  async cityToIata(name: string): Promise<string> {
    const code = this.cities[name];
    if (!code) throw new ValidationError(`Unknown city: ${name}`);
    return code;
  }

  async searchLocations(keyword: string): Promise<LocationSummary[]> {
    return Object.values(this.locations).filter((l) =>
      l.name.toLowerCase().startsWith(keyword.toLowerCase())
    );
  }

  async locationInfo(code: string): Promise<LocationSummary | null> {
    return this.locations[code] ?? null;
  }

  async searchOffers(params: OfferSearchParams): Promise<OfferSearchResult> {
    this.searches.push(params);
    const found = this.offersByDestination[params.destination] ?? [];
    if (found instanceof Error) throw found;
    return { offers: found, rejected: 0, total: found.length };
  }

  async inspiration(
    _origin: string,
    _departureDate: string,
    limit: number
  ): Promise<InspirationCandidate[]> {
    return this.candidates.slice(0, limit);
  }
}

export class FakeClimateProvider implements IClimateProvider {
  readonly months: number[] = [];
  points: Record<string, GeoPoint> = {};
  reading: ClimateReading = { temperatureC: null, rainMm: null };

  async geocode(city: string): Promise<GeoPoint | null> {
    return this.points[city] ?? null;
  }

  async monthlyClimate(_lat: number, _lon: number, month: number): Promise<ClimateReading> {
    this.months.push(month);
    return this.reading;
  }
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function requestUrl(input: string | URL | Request): URL {
  if (typeof input === "string") return new URL(input);
  if (input instanceof URL) return input;
  return new URL(input.url);
}
