import { loadConfig } from "./config.js";
import { createServices } from "./services/index.js";
import { errorMessage } from "./utils/errors.js";
import { createLogger } from "./utils/logger.js";

interface HealthResult {
  provider: string;
  credentials: boolean;
  reachable: boolean | null;
  responseMs: number | null;
  error: string | null;
}

async function probe(
  provider: string,
  credentials: boolean,
  call: () => Promise<unknown>
): Promise<HealthResult> {
  const result: HealthResult = {
    provider,
    credentials,
    reachable: null,
    responseMs: null,
    error: null,
  };
  if (!credentials) return result;

  const start = performance.now();
  try {
    await call();
    result.reachable = true;
  } catch (err) {
    result.reachable = false;
    result.error = errorMessage(err);
  }
  result.responseMs = Math.round(performance.now() - start);
  return result;
}

async function main() {
  const config = loadConfig();
  const services = createServices(config, createLogger("warn"));

  console.log("Trip finder health check\n");

  const results = await Promise.all([
    probe("amadeus", services.flights.isAvailable(), () => services.flights.cityToIata("Paris")),
    probe("open-meteo", true, async () => {
      const hit = await services.climate.geocode("Paris");
      if (!hit) throw new Error("no geocoding result");
    }),
    // Only the key is checked: a completion costs money.
    Promise.resolve<HealthResult>({
      provider: "openai",
      credentials: services.parser !== null,
      reachable: null,
      responseMs: null,
      error: null,
    }),
  ]);

  const nameW = 12;
  const credW = 13;
  const statusW = 12;
  const timeW = 10;
  const errorW = 30;

  const header = [
    "Provider".padEnd(nameW),
    "Credentials".padEnd(credW),
    "Status".padEnd(statusW),
    "Time".padEnd(timeW),
    "Error".padEnd(errorW),
  ].join(" | ");

  console.log(header);
  console.log([nameW, credW, statusW, timeW, errorW].map((w) => "-".repeat(w)).join("-+-"));

  for (const r of results) {
    let status: string;
    if (r.reachable === null) status = "skipped";
    else if (r.reachable) status = "reachable";
    else status = "FAILED";

    console.log(
      [
        r.provider.padEnd(nameW),
        (r.credentials ? "OK" : "missing").padEnd(credW),
        status.padEnd(statusW),
        (r.responseMs !== null ? `${r.responseMs}ms` : "-").padEnd(timeW),
        (r.error ? r.error.slice(0, errorW) : "-").padEnd(errorW),
      ].join(" | ")
    );
  }

  const flightsUp = results[0].reachable === true;
  console.log(`\nFlight provider ${flightsUp ? "reachable" : "NOT reachable"}`);
  process.exit(flightsUp ? 0 : 1);
}

main().catch((err) => {
  console.error("Health check crashed:", errorMessage(err));
  process.exit(1);
});
