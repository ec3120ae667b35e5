import { describe, expect, it, vi } from "vitest";
import {
  RequestParser,
  completeDates,
  toTravelQuery,
  type CompleteJson,
} from "../src/services/request-parser.js";
import { UpstreamError, ValidationError } from "../src/utils/errors.js";

function parserReturning(output: string) {
  const complete = vi.fn<CompleteJson>(async () => output);
  return { complete, parser: new RequestParser(complete) };
}

describe("RequestParser", () => {
  it("completes a period into exact dates and applies defaults", async () => {
    const { parser, complete } = parserReturning(
      JSON.stringify({
        originCity: "Paris",
        destinationCity: "Bangkok",
        period: { start: "2026-01-10", durationDays: "21" },
        passengers: { adults: 2 },
      })
    );

    const parsed = await parser.parse("  Paris to Bangkok in January, 3 weeks, two of us ");

    expect(parsed).toEqual({
      originCity: "Paris",
      destinationCity: "Bangkok",
      period: { start: "2026-01-10", durationDays: 21 },
      departureDate: "2026-01-10",
      returnDate: "2026-01-31",
      passengers: { adults: 2, children: 0, infants: 0 },
      maxStops: 1,
      travelClass: "ECONOMY",
    });
    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete.mock.calls[0][0]).toContain("Expected schema:");
    expect(complete.mock.calls[0][1]).toBe("Paris to Bangkok in January, 3 weeks, two of us");
  });

  it("ignores null fields from the model", async () => {
    const { parser } = parserReturning(
      JSON.stringify({
        originCity: "Lyon",
        destinationCity: "Rome",
        departureDate: "2026-05-01",
        returnDate: "2026-05-08",
        budgetPerPax: null,
        period: null,
      })
    );
    const parsed = await parser.parse("Lyon Rome May 1 to 8");
    expect(parsed.budgetPerPax).toBeUndefined();
    expect(parsed.period).toBeUndefined();
    expect(parsed.returnDate).toBe("2026-05-08");
  });

  it("only asks for fields the search uses", async () => {
    const { parser, complete } = parserReturning(
      JSON.stringify({
        originCity: "Lyon",
        destinationCity: "Rome",
        departureDate: "2026-05-01",
        returnDate: "2026-05-08",
        flexDays: 2,
      })
    );
    const parsed = await parser.parse("Lyon Rome May 1 to 8, give or take two days");
    expect(complete.mock.calls[0][0]).not.toContain("flexDays");
    expect(Object.keys(parsed)).not.toContain("flexDays");
  });

  it("rejects an empty message without calling the model", async () => {
    const { parser, complete } = parserReturning("{}");
    await expect(parser.parse("   ")).rejects.toBeInstanceOf(ValidationError);
    expect(complete).not.toHaveBeenCalled();
  });

  it("reports output that is not JSON", async () => {
    const { parser } = parserReturning("Sure! Here are your flights.");
    await expect(parser.parse("Paris to Rome")).rejects.toThrow(
      "OpenAI error: 502 response was not valid JSON"
    );
  });

  it("reports output that breaks the schema", async () => {
    const { parser } = parserReturning(JSON.stringify({ maxStops: 9 }));
    await expect(parser.parse("Paris to Rome")).rejects.toBeInstanceOf(UpstreamError);
  });

  it("wraps a failing completion call", async () => {
    const parser = new RequestParser(async () => {
      throw new Error("rate limited");
    });
    await expect(parser.parse("Paris to Rome")).rejects.toThrow(
      "OpenAI error: 502 rate limited"
    );
  });
});

describe("completeDates", () => {
  it("keeps exact dates over a period", () => {
    const parsed = {
      departureDate: "2026-02-01",
      returnDate: "2026-02-10",
      period: { start: "2026-03-01", durationDays: 5 },
      passengers: { adults: 1, children: 0, infants: 0 },
      maxStops: 1,
      travelClass: "ECONOMY" as const,
    };
    expect(completeDates(parsed)).toBe(parsed);
  });
});

describe("toTravelQuery", () => {
  it("names what is missing", () => {
    expect(() =>
      toTravelQuery({
        originCity: "Paris",
        departureDate: "2026-02-01",
        returnDate: "2026-02-10",
        passengers: { adults: 1, children: 0, infants: 0 },
        maxStops: 1,
        travelClass: "ECONOMY",
      })
    ).toThrow("Could not find destinationCity in the request");
  });

  it("builds a search query", () => {
    const q = toTravelQuery({
      originCity: "Paris",
      destinationCity: "Tokyo",
      departureDate: "2026-04-01",
      returnDate: "2026-04-15",
      passengers: { adults: 1, children: 1, infants: 0 },
      maxStops: 0,
      budgetPerPax: 900,
      travelClass: "ECONOMY",
    });
    expect(q).toMatchObject({
      originCity: "Paris",
      destinationCity: "Tokyo",
      departureDate: "2026-04-01",
      returnDate: "2026-04-15",
      oneWay: false,
      maxStops: 0,
      budgetPerPax: 900,
    });
  });
});
