import OpenAI from "openai";
import type { AppConfig } from "../config.js";
import { AmadeusClient } from "../providers/amadeus.js";
import { OpenMeteoClient } from "../providers/open-meteo.js";
import type { Logger } from "../utils/logger.js";
import { DestinationDiscovery } from "./discover.js";
import { RequestParser, openAiCompleter } from "./request-parser.js";
import { FlightSearch } from "./search.js";

export interface Services {
  flights: AmadeusClient;
  climate: OpenMeteoClient;
  search: FlightSearch;
  discovery: DestinationDiscovery;
  /** Null when no OpenAI key is configured. */
  parser: RequestParser | null;
}

export function createServices(config: AppConfig, logger: Logger): Services {
  const flights = new AmadeusClient({
    host: config.amadeus.host,
    clientId: config.amadeus.clientId,
    clientSecret: config.amadeus.clientSecret,
    currency: config.currency,
    logger,
  });
  const climate = new OpenMeteoClient({
    logger,
    referenceYear: config.climate.referenceYear,
  });

  const parser = config.openai.apiKey
    ? new RequestParser(
        openAiCompleter(new OpenAI({ apiKey: config.openai.apiKey }), config.openai.model),
        logger
      )
    : null;

  return {
    flights,
    climate,
    search: new FlightSearch(flights, {
      currency: config.currency,
      maxOffers: config.search.maxOffers,
      logger,
    }),
    discovery: new DestinationDiscovery(flights, climate, { ...config.discover, logger }),
    parser,
  };
}
