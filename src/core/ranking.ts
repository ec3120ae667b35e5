import {
  countStops,
  itineraryStops,
  totalDurationMinutes,
  type Offer,
} from "./offer.js";
import { bounds, normalize, round } from "./normalize.js";

export interface RankingWeights {
  price: number;
  duration: number;
}

/** Price counts 1.5x as much as duration when picking the recommended offer. */
export const DEFAULT_RANKING_WEIGHTS: RankingWeights = Object.freeze({
  price: 0.6,
  duration: 0.4,
});

// Scores closer than this are ties; the earlier offer keeps the slot.
export const SCORE_TOLERANCE = 1e-9;

export interface RankedSelection<T> {
  cheapest: T | null;
  recommended: T | null;
  direct: T | null;
}

export interface OfferLeg {
  from: string;
  to: string;
  departure: string;
  arrival: string;
  stops: number;
}

export interface OfferLite {
  readonly id: string;
  readonly priceTotal: number;
  readonly pricePerPax: number;
  readonly currency: string;
  readonly durationMinutes: number;
  readonly durationHhmm: string;
  readonly maxStops: number;
  readonly carriers: readonly string[];
  readonly legs: readonly Readonly<OfferLeg>[];
}

/** First minimum in input order, or null for an empty list. */
function cheapestOf(offers: readonly Offer[]): Offer | null {
  let best: Offer | null = null;
  for (const offer of offers) {
    if (best === null || offer.priceTotal < best.priceTotal) best = offer;
  }
  return best;
}

export function recommendedScore(
  priceNorm: number,
  durationNorm: number,
  weights: RankingWeights = DEFAULT_RANKING_WEIGHTS
): number {
  return weights.price * (1 - priceNorm) + weights.duration * (1 - durationNorm);
}

export function rankOffers(
  offers: readonly Offer[],
  weights: RankingWeights = DEFAULT_RANKING_WEIGHTS
): RankedSelection<Offer> {
  if (offers.length === 0) {
    return { cheapest: null, recommended: null, direct: null };
  }

  const cheapest = cheapestOf(offers);
  const direct = cheapestOf(offers.filter((o) => countStops(o) === 0));

  const durations = offers.map((o) => totalDurationMinutes(o));
  const price = bounds(offers.map((o) => o.priceTotal));
  const duration = bounds(durations);

  let recommended: Offer | null = null;
  let bestScore = -Infinity;
  for (let i = 0; i < offers.length; i++) {
    const score = recommendedScore(
      normalize(offers[i].priceTotal, price.min, price.max),
      normalize(durations[i], duration.min, duration.max),
      weights
    );
    if (score > bestScore + SCORE_TOLERANCE) {
      recommended = offers[i];
      bestScore = score;
    }
  }

  return { cheapest, recommended, direct };
}

/** 125 -> "2h05" */
export function toHhmm(minutes: number): string {
  const h = Math.floor(minutes / 60);
  const m = minutes % 60;
  return `${h}h${String(m).padStart(2, "0")}`;
}

export function toLite(offer: Offer, passengerCount: number): OfferLite {
  const pax = Math.max(1, passengerCount);
  const duration = totalDurationMinutes(offer);
  const carriers: string[] = [];
  const legs: OfferLeg[] = [];

  for (const itinerary of offer.itineraries) {
    const segments = itinerary.segments;
    if (segments.length === 0) continue;

    for (const s of segments) {
      if (s.carrierCode && !carriers.includes(s.carrierCode)) {
        carriers.push(s.carrierCode);
      }
    }

    const first = segments[0];
    const last = segments[segments.length - 1];
    legs.push(
      Object.freeze({
        from: first.departure.iataCode,
        to: last.arrival.iataCode,
        departure: first.departure.at,
        arrival: last.arrival.at,
        stops: itineraryStops(itinerary),
      })
    );
  }

  return Object.freeze({
    id: offer.id,
    priceTotal: round(offer.priceTotal, 2),
    pricePerPax: round(offer.priceTotal / pax, 2),
    currency: offer.currency,
    durationMinutes: duration,
    durationHhmm: toHhmm(duration),
    maxStops: countStops(offer),
    carriers: Object.freeze(carriers),
    legs: Object.freeze(legs),
  });
}

export function mapSelection<T, U>(
  selection: RankedSelection<T>,
  fn: (value: T) => U
): RankedSelection<U> {
  return {
    cheapest: selection.cheapest === null ? null : fn(selection.cheapest),
    recommended: selection.recommended === null ? null : fn(selection.recommended),
    direct: selection.direct === null ? null : fn(selection.direct),
  };
}
