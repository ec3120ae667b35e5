import type { ReadOffersResult } from "../core/offer.js";
import type { ClimateReading } from "../core/climate.js";

export type TravelClass = "ECONOMY" | "PREMIUM_ECONOMY" | "BUSINESS" | "FIRST";

export interface OfferSearchParams {
  origin: string;
  destination: string;
  departureDate: string;
  returnDate?: string;
  adults: number;
  children: number;
  infants: number;
  max: number;
  travelClass?: TravelClass;
  nonStop?: boolean;
}

export interface OfferSearchResult extends ReadOffersResult {
  /** Records returned upstream, including rejected ones. */
  total: number;
}

export interface InspirationCandidate {
  destination: string;
  priceTotal: number;
}

export interface LocationSummary {
  iataCode: string;
  name: string;
  cityName: string;
  subType: string;
  /** analytics.travelers.score, 0..100 */
  travelersScore: number | null;
}

export interface GeoPoint {
  name: string;
  latitude: number;
  longitude: number;
  countryCode?: string;
}

export interface IFlightProvider {
  readonly name: string;
  isAvailable(): boolean;
  cityToIata(name: string): Promise<string>;
  searchLocations(keyword: string): Promise<LocationSummary[]>;
  locationInfo(code: string): Promise<LocationSummary | null>;
  searchOffers(params: OfferSearchParams): Promise<OfferSearchResult>;
  inspiration(origin: string, departureDate: string, limit: number): Promise<InspirationCandidate[]>;
}

export interface IClimateProvider {
  geocode(city: string): Promise<GeoPoint | null>;
  monthlyClimate(latitude: number, longitude: number, month: number): Promise<ClimateReading>;
}
