import { z } from "zod";

export interface FlightPoint {
  iataCode: string;
  at: string; // local ISO 8601 timestamp
}

export interface Segment {
  carrierCode: string;
  number: string;
  departure: FlightPoint;
  arrival: FlightPoint;
}

export interface Itinerary {
  duration: string; // ISO 8601, e.g. PT2H30M
  segments: Segment[];
}

export interface Offer {
  id: string;
  priceTotal: number;
  currency: string;
  itineraries: Itinerary[];
}

// Provider records are parsed leniently: every field degrades to an empty
// value instead of failing the whole batch. Only the price is mandatory.
const PointSchema = z
  .object({
    iataCode: z.string().catch(""),
    at: z.string().catch(""),
  })
  .catch({ iataCode: "", at: "" });

const SegmentSchema = z.object({
  carrierCode: z.string().catch(""),
  number: z.union([z.string(), z.number()]).transform(String).catch(""),
  departure: PointSchema,
  arrival: PointSchema,
});

const ItinerarySchema = z.object({
  duration: z.string().catch(""),
  segments: z.array(SegmentSchema).nullish().catch([]).transform((s) => s ?? []),
});

const PriceSchema = z
  .object({
    grandTotal: z.union([z.string(), z.number()]).optional(),
    total: z.union([z.string(), z.number()]).optional(),
    currency: z.string().optional(),
  })
  .optional()
  .catch(undefined);

const RawOfferSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String).catch(""),
  price: PriceSchema,
  itineraries: z.array(ItinerarySchema).nullish().catch([]).transform((i) => i ?? []),
});

/**
 * Reads a decimal amount from a string or number. Returns null when the value
 * is absent, not a finite number, or negative.
 */
export function readAmount(value: unknown): number | null {
  let amount: number;
  if (typeof value === "number") {
    amount = value;
  } else if (typeof value === "string" && value.trim() !== "") {
    amount = Number(value.trim());
  } else {
    return null;
  }
  return Number.isFinite(amount) && amount >= 0 ? amount : null;
}

/**
 * Converts one raw flight-offers record into an {@link Offer}.
 * `grandTotal` is preferred over `total` (it includes ancillary fees).
 * Returns null when the record is not an object or carries no usable price.
 */
export function readOffer(raw: unknown): Offer | null {
  const parsed = RawOfferSchema.safeParse(raw);
  if (!parsed.success) return null;

  const { id, price, itineraries } = parsed.data;
  const priceTotal = readAmount(price?.grandTotal) ?? readAmount(price?.total);
  if (priceTotal === null) return null;

  return {
    id,
    priceTotal,
    currency: price?.currency ?? "",
    itineraries,
  };
}

export interface ReadOffersResult {
  offers: Offer[];
  rejected: number;
}

export function readOffers(raw: readonly unknown[]): ReadOffersResult {
  const offers: Offer[] = [];
  let rejected = 0;
  for (const item of raw) {
    const offer = readOffer(item);
    if (offer) offers.push(offer);
    else rejected++;
  }
  return { offers, rejected };
}

/** PT2H30M -> 150. Anything without the PT prefix counts as zero. */
export function parseDuration(iso: string | null | undefined): number {
  if (!iso || !iso.startsWith("PT")) return 0;
  const hours = iso.match(/(\d+)H/);
  const minutes = iso.match(/(\d+)M/);
  return (
    (hours ? parseInt(hours[1], 10) : 0) * 60 +
    (minutes ? parseInt(minutes[1], 10) : 0)
  );
}

interface HasSegments {
  segments?: readonly unknown[] | null;
}

interface HasDuration {
  duration?: string | null;
}

export function itineraryStops(itinerary: HasSegments): number {
  return Math.max(0, (itinerary.segments?.length ?? 0) - 1);
}

/** Worst direction wins: a direct outbound with a one-stop return counts as 1. */
export function countStops(offer: { itineraries: readonly HasSegments[] }): number {
  let stops = 0;
  for (const itinerary of offer.itineraries) {
    stops = Math.max(stops, itineraryStops(itinerary));
  }
  return stops;
}

export function totalDurationMinutes(offer: {
  itineraries: readonly HasDuration[];
}): number {
  let total = 0;
  for (const itinerary of offer.itineraries) {
    total += parseDuration(itinerary.duration);
  }
  return total;
}
