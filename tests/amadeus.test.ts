import { describe, expect, it, vi } from "vitest";
import { AmadeusClient } from "../src/providers/amadeus.js";
import { ConfigurationError, UpstreamError, ValidationError } from "../src/utils/errors.js";
import { RateLimiter } from "../src/utils/rate-limiter.js";
import { jsonResponse, requestUrl } from "./helpers.js";

const HOST = "https://flights.test";

type Route = (url: URL) => Response;

function setup(routes: Record<string, Route | Route[]>, credentials = true) {
  const queues = new Map<string, Route[]>(
    Object.entries(routes).map(([path, r]) => [path, Array.isArray(r) ? [...r] : [r]])
  );
  const fetchMock = vi.fn<typeof fetch>(async (input) => {
    const url = requestUrl(input);
    if (url.pathname === "/v1/security/oauth2/token") {
      return jsonResponse({ access_token: "test-token", expires_in: 1799 });
    }
    const queue = queues.get(url.pathname);
    const route = queue && (queue.length > 1 ? queue.shift() : queue[0]);
    if (!route) return jsonResponse({ errors: [] }, 404);
    return route(url);
  });

  const client = new AmadeusClient({
    host: HOST,
    clientId: credentials ? "test-id" : "",
    clientSecret: credentials ? "test-secret" : "",
    currency: "EUR",
    fetch: fetchMock,
    limiter: new RateLimiter(100, 100),
  });
  return { client, fetchMock };
}

function urlsOf(fetchMock: ReturnType<typeof setup>["fetchMock"]): URL[] {
  return fetchMock.mock.calls.map(([input]) => requestUrl(input));
}

describe("AmadeusClient", () => {
  it("prefers a city code and reuses the token", async () => {
    const { client, fetchMock } = setup({
      "/v1/reference-data/locations": () =>
        jsonResponse({
          data: [
            { iataCode: "CDG", subType: "AIRPORT", name: "CHARLES DE GAULLE" },
            { iataCode: "PAR", subType: "CITY", name: "PARIS", address: { cityName: "PARIS" } },
          ],
        }),
    });

    expect(await client.cityToIata("Paris")).toBe("PAR");
    expect(await client.cityToIata("Paris")).toBe("PAR");

    const tokenCalls = urlsOf(fetchMock).filter((u) => u.pathname.endsWith("/token"));
    expect(tokenCalls).toHaveLength(1);

    const lookup = fetchMock.mock.calls[1];
    expect(lookup[1]?.headers).toEqual({ Authorization: "Bearer test-token" });
    expect(requestUrl(lookup[0]).searchParams.get("keyword")).toBe("Paris");
  });

  it("shares one token request between concurrent calls", async () => {
    const { client, fetchMock } = setup({
      "/v1/reference-data/locations": () =>
        jsonResponse({ data: [{ iataCode: "PAR", subType: "CITY", name: "PARIS" }] }),
    });

    await Promise.all([client.cityToIata("Paris"), client.cityToIata("Lyon")]);

    const tokenCalls = urlsOf(fetchMock).filter((u) => u.pathname.endsWith("/token"));
    expect(tokenCalls).toHaveLength(1);
  });

  it("falls back to the first airport", async () => {
    const { client } = setup({
      "/v1/reference-data/locations": () =>
        jsonResponse({ data: [{ iataCode: "BVA", subType: "AIRPORT", name: "BEAUVAIS" }] }),
    });
    expect(await client.cityToIata("Beauvais")).toBe("BVA");
  });

  it("rejects an unknown city", async () => {
    const { client } = setup({
      "/v1/reference-data/locations": () => jsonResponse({ data: [] }),
    });
    await expect(client.cityToIata("Atlantis")).rejects.toThrow("Unknown city: Atlantis");
    await expect(client.cityToIata("Atlantis")).rejects.toBeInstanceOf(ValidationError);
  });

  it("reads offers and drops the ones without a price", async () => {
    const { client, fetchMock } = setup({
      "/v2/shopping/flight-offers": () =>
        jsonResponse({
          data: [
            { id: "1", price: { grandTotal: "412.30", currency: "EUR" }, itineraries: [] },
            { id: "2", price: { total: "abc" }, itineraries: [] },
            { id: "3", price: { total: "398.00", currency: "EUR" }, itineraries: [] },
          ],
        }),
    });

    const result = await client.searchOffers({
      origin: "PAR",
      destination: "BKK",
      departureDate: "2026-01-10",
      returnDate: "2026-01-31",
      adults: 2,
      children: 0,
      infants: 1,
      max: 50,
    });

    expect(result.total).toBe(3);
    expect(result.rejected).toBe(1);
    expect(result.offers.map((o) => [o.id, o.priceTotal])).toEqual([
      ["1", 412.3],
      ["3", 398],
    ]);

    const params = urlsOf(fetchMock)[1].searchParams;
    expect(Object.fromEntries(params)).toEqual({
      originLocationCode: "PAR",
      destinationLocationCode: "BKK",
      departureDate: "2026-01-10",
      returnDate: "2026-01-31",
      adults: "2",
      infants: "1",
      currencyCode: "EUR",
      nonStop: "false",
      max: "50",
      travelClass: "ECONOMY",
    });
  });

  it("raises upstream errors with the status", async () => {
    const { client } = setup({
      "/v2/shopping/flight-offers": () => new Response("server exploded", { status: 500 }),
    });
    const call = client.searchOffers({
      origin: "PAR",
      destination: "BKK",
      departureDate: "2026-01-10",
      adults: 1,
      children: 0,
      infants: 0,
      max: 10,
    });
    await expect(call).rejects.toBeInstanceOf(UpstreamError);
    await expect(call).rejects.toThrow("Amadeus error: 500 server exploded");
  });

  it("refuses to call without credentials", async () => {
    const { client, fetchMock } = setup({}, false);
    expect(client.isAvailable()).toBe(false);
    await expect(client.cityToIata("Paris")).rejects.toBeInstanceOf(ConfigurationError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("retries inspiration with the alternate parameter form", async () => {
    const { client, fetchMock } = setup({
      "/v1/shopping/flight-destinations": [
        () => jsonResponse({ errors: [{ code: 38196 }] }, 403),
        () =>
          jsonResponse({
            data: [
              { destination: "MAD", price: { total: "120.00" } },
              { destinationLocationCode: "LIS", price: { total: "95.50" } },
              { destination: "OPO" },
              { destination: "ROM", price: { total: "150.00" } },
            ],
          }),
      ],
    });

    const candidates = await client.inspiration("PAR", "2026-07-01", 2);

    expect(candidates).toEqual([
      { destination: "LIS", priceTotal: 95.5 },
      { destination: "MAD", priceTotal: 120 },
    ]);
    const [first, second] = urlsOf(fetchMock).filter((u) =>
      u.pathname.endsWith("/flight-destinations")
    );
    expect(first.searchParams.get("origin")).toBe("PAR");
    expect(first.searchParams.get("viewBy")).toBe("DESTINATION");
    expect(second.searchParams.get("originLocationCode")).toBe("PAR");
  });

  it("skips inspiration entries with an empty price", async () => {
    const { client } = setup({
      "/v1/shopping/flight-destinations": () =>
        jsonResponse({
          data: [
            { destination: "MAD", price: { total: "" } },
            { destination: "LIS", price: { total: "95.50" } },
          ],
        }),
    });

    expect(await client.inspiration("PAR", "2026-07-01", 5)).toEqual([
      { destination: "LIS", priceTotal: 95.5 },
    ]);
  });

  it("returns no candidates when every inspiration form is refused", async () => {
    const { client } = setup({
      "/v1/shopping/flight-destinations": () => jsonResponse({}, 404),
    });
    expect(await client.inspiration("PAR", "2026-07-01", 5)).toEqual([]);
  });

  it("propagates other inspiration failures", async () => {
    const { client } = setup({
      "/v1/shopping/flight-destinations": () => jsonResponse({}, 500),
    });
    await expect(client.inspiration("PAR", "2026-07-01", 5)).rejects.toBeInstanceOf(UpstreamError);
  });

  it("summarizes a location with its traffic score", async () => {
    const { client, fetchMock } = setup({
      "/v1/reference-data/locations": () =>
        jsonResponse({
          data: [
            {
              iataCode: "LIS",
              subType: "CITY",
              name: "LISBON",
              address: { cityName: "LISBON" },
              analytics: { travelers: { score: 27 } },
            },
          ],
        }),
    });

    expect(await client.locationInfo("LIS")).toEqual({
      iataCode: "LIS",
      name: "LISBON",
      cityName: "LISBON",
      subType: "CITY",
      travelersScore: 27,
    });
    expect(urlsOf(fetchMock)[1].searchParams.get("sort")).toBe("analytics.travelers.score");
  });
});
