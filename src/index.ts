#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { loadConfig } from "./config.js";
import { createServices } from "./services/index.js";
import { AppError, errorMessage } from "./utils/errors.js";
import { createLogger } from "./utils/logger.js";

import { searchFlightsSchema, handleSearchFlights } from "./tools/search-flights.js";
import { planTripSchema, handlePlanTrip } from "./tools/plan-trip.js";
import { discoverSchema, handleDiscover } from "./tools/discover-destinations.js";
import { findLocationsSchema, handleFindLocations } from "./tools/find-locations.js";

const config = loadConfig();
const logger = createLogger(config.logLevel);
const services = createServices(config, logger);

if (!services.flights.isAvailable()) {
  logger.warn("Amadeus credentials missing; flight tools will fail until they are set");
}

type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

async function run(tool: string, handler: () => Promise<string>): Promise<ToolResult> {
  try {
    const text = await handler();
    return { content: [{ type: "text", text }] };
  } catch (err) {
    const status = err instanceof AppError ? err.status : 500;
    if (status >= 500) logger.error(`${tool} failed`, { error: errorMessage(err) });
    else logger.info(`${tool} rejected`, { status, error: errorMessage(err) });
    return {
      content: [{ type: "text", text: `Error (${status}): ${errorMessage(err)}` }],
      isError: true,
    };
  }
}

const server = new McpServer({
  name: "trip-finder",
  version: "1.0.0",
});

// Tool 1: search_flights
server.tool(
  "search_flights",
  "Search round-trip flights between two cities given in plain text. Returns three picks: the cheapest offer, the recommended offer (best price/duration balance) and the cheapest direct offer.",
  searchFlightsSchema.shape,
  async (input) => run("search_flights", () => handleSearchFlights(input, services.search))
);

// Tool 2: plan_trip
server.tool(
  "plan_trip",
  "Understand a free-text travel request (cities, dates or period, travellers, stops, budget) and run the flight search for it.",
  planTripSchema.shape,
  async (input) =>
    run("plan_trip", () => handlePlanTrip(input, services.parser, services.search))
);

// Tool 3: discover_destinations
server.tool(
  "discover_destinations",
  "Suggest where to go from a city when there is no fixed destination. Destinations are scored on price, expected weather for the travel month and popularity.",
  discoverSchema.shape,
  async (input) =>
    run("discover_destinations", () => handleDiscover(input, services.discovery))
);

// Tool 4: find_locations
server.tool(
  "find_locations",
  "Autocomplete city and airport names to IATA codes.",
  findLocationsSchema.shape,
  async (input) =>
    run("find_locations", () => handleFindLocations(input, services.flights))
);

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("Trip finder MCP server running on stdio");
}

main().catch((err) => {
  logger.error("Fatal error", { error: errorMessage(err) });
  process.exit(1);
});
