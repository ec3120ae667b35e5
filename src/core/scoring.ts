import type { OfferLite } from "./ranking.js";
import { bounds, normalize, round } from "./normalize.js";

export interface ScoringWeights {
  price: number;
  climate: number;
  popularity: number;
}

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = Object.freeze({
  price: 0.45,
  climate: 0.35,
  popularity: 0.2,
});

export const NEUTRAL_SIGNAL = 0.5;

export interface DestinationCandidate {
  city: string;
  locationCode: string;
  offer: OfferLite;
  /** [0, 1]; unknown climate scores as {@link NEUTRAL_SIGNAL}. */
  climateSuitability?: number | null;
  /** [0, 1]; unknown popularity scores as {@link NEUTRAL_SIGNAL}. */
  popularity?: number | null;
}

export type ScoredDestination<C extends DestinationCandidate = DestinationCandidate> =
  C & { score: number };

export interface ScoreOptions {
  weights?: ScoringWeights;
  /** Keep only the best N. */
  limit?: number;
  /** Which offer price to compare. Must be the same for the whole batch. */
  priceBasis?: "total" | "perPax";
}

function signal(value: number | null | undefined): number {
  return typeof value === "number" && Number.isFinite(value) ? value : NEUTRAL_SIGNAL;
}

/**
 * Blends normalized price, climate suitability and popularity into a score
 * rounded to 4 decimals, sorted best first. Equal scores keep input order.
 */
export function scoreDestinations<C extends DestinationCandidate>(
  candidates: readonly C[],
  options: ScoreOptions = {}
): ScoredDestination<C>[] {
  const weights = options.weights ?? DEFAULT_SCORING_WEIGHTS;
  const priceOf = (c: C) =>
    options.priceBasis === "perPax" ? c.offer.pricePerPax : c.offer.priceTotal;

  const price = bounds(candidates.map(priceOf));

  const scored = candidates.map((c) => {
    const priceNorm = normalize(priceOf(c), price.min, price.max);
    const composite =
      weights.price * (1 - priceNorm) +
      weights.climate * signal(c.climateSuitability) +
      weights.popularity * signal(c.popularity);
    return { ...c, score: round(composite, 4) };
  });

  // Array.prototype.sort is stable, so ties stay in input order.
  scored.sort((a, b) => b.score - a.score);
  return options.limit === undefined ? scored : scored.slice(0, options.limit);
}
