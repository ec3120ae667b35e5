import { z } from "zod";
import { readAmount, readOffers } from "../core/offer.js";
import {
  ConfigurationError,
  UpstreamError,
  ValidationError,
} from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";
import { RateLimiter } from "../utils/rate-limiter.js";
import type {
  IFlightProvider,
  InspirationCandidate,
  LocationSummary,
  OfferSearchParams,
  OfferSearchResult,
} from "./provider.js";

type QueryValue = string | number | boolean | null | undefined;

export interface AmadeusOptions {
  host: string;
  clientId: string;
  clientSecret: string;
  currency: string;
  fetch?: typeof fetch;
  logger?: Logger;
  limiter?: RateLimiter;
}

const TokenSchema = z.object({
  access_token: z.string(),
  expires_in: z.number(),
});

const DataEnvelope = z.object({ data: z.array(z.unknown()).nullish() });

const LocationSchema = z.object({
  iataCode: z.string().catch(""),
  name: z.string().catch(""),
  subType: z.string().catch(""),
  address: z.object({ cityName: z.string().optional() }).optional().catch(undefined),
  analytics: z
    .object({ travelers: z.object({ score: z.number().optional() }).optional() })
    .optional()
    .catch(undefined),
});

const InspirationSchema = z.object({
  destination: z.string().optional(),
  destinationLocationCode: z.string().optional(),
  price: z.object({ total: z.union([z.string(), z.number()]).optional() }).optional(),
});

// Accounts differ on which parameter the inspiration endpoint accepts.
const INSPIRATION_FALLBACK_STATUSES = new Set([401, 403, 404]);

export class AmadeusClient implements IFlightProvider {
  readonly name = "amadeus" as const;
  private readonly host: string;
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly currency: string;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;
  private readonly limiter: RateLimiter;

  private accessToken = "";
  private tokenExpiry = 0;
  private pendingToken: Promise<void> | null = null;

  constructor(options: AmadeusOptions) {
    this.host = options.host;
    this.clientId = options.clientId;
    this.clientSecret = options.clientSecret;
    this.currency = options.currency;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? silentLogger;
    this.limiter = options.limiter ?? new RateLimiter(5, 1);
  }

  isAvailable(): boolean {
    return this.clientId.length > 0 && this.clientSecret.length > 0;
  }

  /** Resolves a free-text city to an IATA code, preferring a city code over an airport. */
  async cityToIata(name: string): Promise<string> {
    const locations = await this.searchLocations(name);
    if (locations.length === 0) {
      throw new ValidationError(`Unknown city: ${name}`);
    }
    const city = locations.find((l) => l.subType === "CITY");
    return (city ?? locations[0]).iataCode;
  }

  async searchLocations(keyword: string, sortByTraffic = false): Promise<LocationSummary[]> {
    const body = await this.get(
      "/v1/reference-data/locations",
      {
        subType: "CITY,AIRPORT",
        keyword,
        sort: sortByTraffic ? "analytics.travelers.score" : undefined,
      },
      10_000
    );
    return this.dataOf(body).flatMap((item) => {
      const parsed = LocationSchema.safeParse(item);
      if (!parsed.success || !parsed.data.iataCode) return [];
      const l = parsed.data;
      return [
        {
          iataCode: l.iataCode,
          name: l.name,
          cityName: l.address?.cityName || l.name,
          subType: l.subType,
          travelersScore: l.analytics?.travelers?.score ?? null,
        },
      ];
    });
  }

  /** The most trafficked location matching a code, or null when there is none. */
  async locationInfo(code: string): Promise<LocationSummary | null> {
    const locations = await this.searchLocations(code, true);
    return locations[0] ?? null;
  }

  async searchOffers(params: OfferSearchParams): Promise<OfferSearchResult> {
    const body = await this.get(
      "/v2/shopping/flight-offers",
      {
        originLocationCode: params.origin,
        destinationLocationCode: params.destination,
        departureDate: params.departureDate,
        returnDate: params.returnDate,
        adults: params.adults,
        children: params.children || undefined,
        infants: params.infants || undefined,
        currencyCode: this.currency,
        nonStop: params.nonStop ?? false,
        max: params.max,
        travelClass: params.travelClass ?? "ECONOMY",
      },
      30_000
    );

    const raw = this.dataOf(body);
    const result = readOffers(raw);
    if (result.rejected > 0) {
      this.logger.warn("Dropped flight offers without a usable price", {
        route: `${params.origin}-${params.destination}`,
        rejected: result.rejected,
      });
    }
    return { ...result, total: raw.length };
  }

  async inspiration(
    origin: string,
    departureDate: string,
    limit: number
  ): Promise<InspirationCandidate[]> {
    const attempts: Array<Record<string, QueryValue>> = [
      { origin, departureDate, oneWay: false, viewBy: "DESTINATION" },
      { originLocationCode: origin, departureDate },
    ];

    for (const params of attempts) {
      let body: unknown;
      try {
        body = await this.get("/v1/shopping/flight-destinations", params, 20_000);
      } catch (err) {
        if (err instanceof UpstreamError && INSPIRATION_FALLBACK_STATUSES.has(err.status)) {
          this.logger.debug("Inspiration request refused, trying next form", {
            status: err.status,
          });
          continue;
        }
        throw err;
      }

      const candidates: InspirationCandidate[] = [];
      for (const item of this.dataOf(body)) {
        const parsed = InspirationSchema.safeParse(item);
        if (!parsed.success) continue;
        const destination = parsed.data.destination ?? parsed.data.destinationLocationCode;
        const price = readAmount(parsed.data.price?.total);
        if (!destination || price === null) continue;
        candidates.push({ destination, priceTotal: price });
      }
      return candidates.sort((a, b) => a.priceTotal - b.priceTotal).slice(0, limit);
    }

    return [];
  }

  private dataOf(body: unknown): unknown[] {
    const parsed = DataEnvelope.safeParse(body);
    return parsed.success ? parsed.data.data ?? [] : [];
  }

  private async get(
    path: string,
    params: Record<string, QueryValue>,
    timeoutMs: number
  ): Promise<unknown> {
    await this.limiter.acquire();
    await this.ensureToken();

    const query = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value !== null) query.set(key, String(value));
    }

    const resp = await this.fetchImpl(`${this.host}${path}?${query}`, {
      headers: { Authorization: `Bearer ${this.accessToken}` },
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!resp.ok) {
      throw new UpstreamError("Amadeus", resp.status, await resp.text());
    }
    const body: unknown = await resp.json();
    return body;
  }

  private async ensureToken(): Promise<void> {
    if (this.accessToken && Date.now() < this.tokenExpiry) return;
    if (!this.isAvailable()) {
      throw new ConfigurationError(
        "AMADEUS_CLIENT_ID / AMADEUS_CLIENT_SECRET are not configured"
      );
    }
    // Concurrent callers share one OAuth request.
    if (!this.pendingToken) {
      this.pendingToken = this.refreshToken().finally(() => {
        this.pendingToken = null;
      });
    }
    await this.pendingToken;
  }

  private async refreshToken(): Promise<void> {
    const resp = await this.fetchImpl(`${this.host}/v1/security/oauth2/token`, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams({
        grant_type: "client_credentials",
        client_id: this.clientId,
        client_secret: this.clientSecret,
      }),
      signal: AbortSignal.timeout(10_000),
    });

    if (!resp.ok) {
      throw new UpstreamError("Amadeus OAuth", resp.status, await resp.text());
    }

    const parsed = TokenSchema.safeParse(await resp.json());
    if (!parsed.success) {
      throw new UpstreamError("Amadeus OAuth", 502, "malformed token response");
    }
    const token = parsed.data;
    this.accessToken = token.access_token;
    // Refresh 60s before expiry
    this.tokenExpiry = Date.now() + (token.expires_in - 60) * 1000;
    this.logger.debug("Amadeus token refreshed", { expiresIn: token.expires_in });
  }
}
