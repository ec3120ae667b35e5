import { addDays as shiftDays, format, isValid, parseISO } from "date-fns";
import { z } from "zod";
import { countStops, type Offer } from "../core/offer.js";
import { ValidationError } from "../utils/errors.js";

export const DAY_FORMAT = "yyyy-MM-dd";

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** True for a YYYY-MM-DD string naming a real calendar day. */
export function isCalendarDay(value: string): boolean {
  return DAY_PATTERN.test(value) && isValid(parseISO(value));
}

export const isoDate = z
  .string()
  .regex(DAY_PATTERN, "expected YYYY-MM-DD")
  .refine((v) => isValid(parseISO(v)), "not a calendar date");

export const PassengersSchema = z.object({
  adults: z.number().int().min(1).default(1),
  children: z.number().int().min(0).default(0),
  infants: z.number().int().min(0).default(0),
});

export const PeriodSchema = z.object({
  start: isoDate.describe("First day of the trip YYYY-MM-DD"),
  durationDays: z.coerce.number().int().min(1).describe("Trip length in days"),
});

export const TravelClassSchema = z.enum(["ECONOMY", "PREMIUM_ECONOMY", "BUSINESS", "FIRST"]);

/** Date and traveller fields shared by direct search and discovery. */
export const TripShape = {
  departureDate: isoDate.optional().describe("Departure date YYYY-MM-DD"),
  returnDate: isoDate.optional().describe("Return date YYYY-MM-DD"),
  period: PeriodSchema.optional().describe("Alternative to exact dates: start + duration"),
  oneWay: z.boolean().default(false).describe("Search outbound flights only"),
  passengers: PassengersSchema.default({}).describe("Travellers by age band"),
  maxStops: z.number().int().min(0).max(3).default(1).describe("Maximum stops per direction"),
  budgetPerPax: z.number().min(0).optional().describe("Maximum price per passenger"),
  travelClass: TravelClassSchema.default("ECONOMY"),
};

export const TravelQuerySchema = z.object({
  originCity: z.string().trim().min(1).describe("Departure city in plain text, e.g. Paris"),
  destinationCity: z.string().trim().min(1).describe("Destination city in plain text, e.g. Bangkok"),
  ...TripShape,
});

export type Passengers = z.infer<typeof PassengersSchema>;
export type Period = z.infer<typeof PeriodSchema>;
export type TravelQuery = z.infer<typeof TravelQuerySchema>;
export type TravelQueryInput = z.input<typeof TravelQuerySchema>;

export interface TripDates {
  departureDate: string;
  returnDate?: string;
}

export function parseDay(isoDay: string): Date {
  if (!isCalendarDay(isoDay)) {
    throw new ValidationError(`Invalid date: ${isoDay}`);
  }
  return parseISO(isoDay);
}

export function addDays(isoDay: string, days: number): string {
  return format(shiftDays(parseDay(isoDay), days), DAY_FORMAT);
}

/**
 * Exact dates win over a period; a period ends `durationDays` after it starts.
 */
export function resolveDates(query: {
  departureDate?: string;
  returnDate?: string;
  period?: Period;
  oneWay?: boolean;
}): TripDates {
  if (query.departureDate && query.returnDate) {
    return {
      departureDate: addDays(query.departureDate, 0),
      returnDate: addDays(query.returnDate, 0),
    };
  }
  if (query.departureDate && query.oneWay) {
    return { departureDate: addDays(query.departureDate, 0) };
  }
  if (query.period) {
    const departureDate = addDays(query.period.start, 0);
    if (query.oneWay) return { departureDate };
    return { departureDate, returnDate: addDays(departureDate, query.period.durationDays) };
  }
  throw new ValidationError(
    "Invalid dates: departureDate/returnDate or period.start + period.durationDays required"
  );
}

export function passengerTotal(passengers: Passengers): number {
  return Math.max(1, passengers.adults + passengers.children + passengers.infants);
}

export interface OfferFilter {
  maxStops: number;
  budgetPerPax?: number;
  passengers: number;
}

export function filterOffers(offers: readonly Offer[], filter: OfferFilter): Offer[] {
  const pax = Math.max(1, filter.passengers);
  return offers.filter((o) => {
    if (countStops(o) > filter.maxStops) return false;
    if (filter.budgetPerPax !== undefined && o.priceTotal / pax > filter.budgetPerPax) {
      return false;
    }
    return true;
  });
}
