import { mapSelection, rankOffers, toLite, type OfferLite, type RankedSelection } from "../core/ranking.js";
import type { IFlightProvider } from "../providers/provider.js";
import type { Logger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";
import {
  filterOffers,
  passengerTotal,
  resolveDates,
  type TravelQuery,
} from "./query.js";

export interface SearchMeta {
  searched: {
    originCity: string;
    destinationCity: string;
    originLocationCode: string;
    destinationLocationCode: string;
    departureDate: string;
    returnDate: string | null;
    passengers: TravelQuery["passengers"];
    maxStops: number;
    budgetPerPax: number | null;
    travelClass: TravelQuery["travelClass"];
    currency: string;
  };
  totalCandidates: number;
  rejected: number;
  kept: number;
}

export interface SearchResult {
  results: RankedSelection<OfferLite>;
  meta: SearchMeta;
}

export interface FlightSearchOptions {
  currency: string;
  maxOffers: number;
  logger?: Logger;
}

export class FlightSearch {
  private readonly provider: IFlightProvider;
  private readonly options: FlightSearchOptions;
  private readonly logger: Logger;

  constructor(provider: IFlightProvider, options: FlightSearchOptions) {
    this.provider = provider;
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  async search(query: TravelQuery): Promise<SearchResult> {
    const dates = resolveDates(query);
    const [origin, destination] = await Promise.all([
      this.provider.cityToIata(query.originCity),
      this.provider.cityToIata(query.destinationCity),
    ]);

    const found = await this.provider.searchOffers({
      origin,
      destination,
      departureDate: dates.departureDate,
      returnDate: dates.returnDate,
      adults: query.passengers.adults,
      children: query.passengers.children,
      infants: query.passengers.infants,
      max: this.options.maxOffers,
      travelClass: query.travelClass,
    });

    const pax = passengerTotal(query.passengers);
    const kept = filterOffers(found.offers, {
      maxStops: query.maxStops,
      budgetPerPax: query.budgetPerPax,
      passengers: pax,
    });

    this.logger.info("Flight search ranked", {
      route: `${origin}-${destination}`,
      total: found.total,
      kept: kept.length,
    });

    return {
      results: mapSelection(rankOffers(kept), (o) => toLite(o, pax)),
      meta: {
        searched: {
          originCity: query.originCity,
          destinationCity: query.destinationCity,
          originLocationCode: origin,
          destinationLocationCode: destination,
          departureDate: dates.departureDate,
          returnDate: dates.returnDate ?? null,
          passengers: query.passengers,
          maxStops: query.maxStops,
          budgetPerPax: query.budgetPerPax ?? null,
          travelClass: query.travelClass,
          currency: this.options.currency,
        },
        totalCandidates: found.total,
        rejected: found.rejected,
        kept: kept.length,
      },
    };
  }
}
