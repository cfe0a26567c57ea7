import { MockAgent } from "undici";

import type { ProviderResult, WeatherError } from "../src/errors.js";
import { aggregate } from "../src/weather/forecast.js";
import { OpenWeatherClient } from "../src/weather/openweather.js";
import { assert, assertDeepEqual, assertEqual } from "./helpers/assert.js";
import { silentLogger } from "./helpers/fakes.js";
import { currentWeatherPayload, forecastPayload, sampleReport, threeHourEntries } from "./helpers/fixtures.js";
import { test } from "./helpers/runner.js";

const ORIGIN = "https://api.example.test";

async function withClient(
  fn: (client: OpenWeatherClient, agent: MockAgent) => Promise<void>,
  timeoutMs = 1_000
): Promise<void> {
  const agent = new MockAgent();
  agent.disableNetConnect();
  const client = new OpenWeatherClient({
    apiKey: "test-key",
    baseUrl: ORIGIN,
    timeoutMs,
    logger: silentLogger,
    dispatcher: agent
  });
  try {
    await fn(client, agent);
  } finally {
    await agent.close();
  }
}

function errorOf<T>(result: ProviderResult<T>): WeatherError {
  if (result.ok) {
    throw new Error("expected a failed result");
  }
  return result.error;
}

const weatherQuery = { q: "Paris", units: "metric", lang: "en", appid: "test-key" };

test("current weather is requested with metric units and mapped", async () => {
  await withClient(async (client, agent) => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/data/2.5/weather", query: weatherQuery, method: "GET" })
      .reply(200, currentWeatherPayload());
    const result = await client.fetchCurrentWeather("Paris", "en");
    assertDeepEqual(result, { ok: true, value: sampleReport() }, "report");
  });
});

test("404 means the city was not found", async () => {
  await withClient(async (client, agent) => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/data/2.5/weather", query: weatherQuery, method: "GET" })
      .reply(404, { cod: "404", message: "city not found" });
    assertDeepEqual(errorOf(await client.fetchCurrentWeather("Paris", "en")), { kind: "not_found", query: "Paris" }, "error");
  });
});

test("other error statuses mean the provider is unavailable", async () => {
  await withClient(async (client, agent) => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/data/2.5/weather", query: weatherQuery, method: "GET" })
      .reply(500, "upstream down");
    assertDeepEqual(
      errorOf(await client.fetchCurrentWeather("Paris", "en")),
      { kind: "provider_unavailable", reason: "HTTP 500" },
      "error"
    );
  });
});

test("network failure means the provider is unavailable", async () => {
  await withClient(async (client, agent) => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/data/2.5/weather", query: weatherQuery, method: "GET" })
      .replyWithError(new Error("connection reset"));
    assertEqual(errorOf(await client.fetchCurrentWeather("Paris", "en")).kind, "provider_unavailable", "kind");
  });
});

test("slow responses time out", async () => {
  await withClient(async (client, agent) => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/data/2.5/weather", query: weatherQuery, method: "GET" })
      .reply(200, currentWeatherPayload())
      .delay(100);
    assertEqual(errorOf(await client.fetchCurrentWeather("Paris", "en")).kind, "provider_unavailable", "kind");
    await new Promise<void>((resolve) => setTimeout(resolve, 150));
  }, 10);
});

test("payload without a required field is malformed", async () => {
  await withClient(async (client, agent) => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/data/2.5/weather", query: weatherQuery, method: "GET" })
      .reply(200, currentWeatherPayload({ main: undefined }));
    const error = errorOf(await client.fetchCurrentWeather("Paris", "en"));
    assert(error.kind === "malformed_payload", "kind");
    assert(error.issues.startsWith("main:"), `issues: ${error.issues}`);
  });
});

test("body that is not JSON is malformed", async () => {
  await withClient(async (client, agent) => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/data/2.5/weather", query: weatherQuery, method: "GET" })
      .reply(200, "<html>maintenance</html>");
    assertDeepEqual(
      errorOf(await client.fetchCurrentWeather("Paris", "en")),
      { kind: "malformed_payload", issues: "invalid JSON" },
      "error"
    );
  });
});

test("forecast entries are mapped in order", async () => {
  await withClient(async (client, agent) => {
    const entries = threeHourEntries(["2024-05-01", "2024-05-02"]);
    agent
      .get(ORIGIN)
      .intercept({
        path: "/data/2.5/forecast",
        query: { q: "Oslo", units: "metric", lang: "ru", appid: "test-key" },
        method: "GET"
      })
      .reply(200, forecastPayload(entries));
    const result = await client.fetchForecast("Oslo", "ru");
    assert(result.ok, "forecast ok");
    assertEqual(result.value.cityName, "Oslo", "city");
    assertEqual(result.value.countryCode, "NO", "country");
    assertDeepEqual(result.value.entries, entries, "entries");
    assertDeepEqual(
      [...aggregate(result.value.entries)].map((s) => [s.calendarDay, s.minTemp, s.maxTemp]),
      [
        ["2024-05-01", 10, 17],
        ["2024-05-02", 10, 17]
      ],
      "per day"
    );
  });
});

test("reverse geocoding returns the first place", async () => {
  await withClient(async (client, agent) => {
    agent
      .get(ORIGIN)
      .intercept({
        path: "/geo/1.0/reverse",
        query: { lat: "52.52", lon: "13.405", limit: "1", appid: "test-key" },
        method: "GET"
      })
      .reply(200, [{ name: "Berlin", local_names: { ru: "Берлин" }, lat: 52.52, lon: 13.405, country: "DE" }]);
    assertDeepEqual(
      await client.reverseGeocode(52.52, 13.405),
      { ok: true, value: { name: "Berlin", country: "DE", lat: 52.52, lon: 13.405 } },
      "place"
    );
  });
});

test("reverse geocoding with no places is not found", async () => {
  await withClient(async (client, agent) => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/geo/1.0/reverse", query: { lat: "0", lon: "0", limit: "1", appid: "test-key" }, method: "GET" })
      .reply(200, []);
    assertDeepEqual(errorOf(await client.reverseGeocode(0, 0)), { kind: "not_found", query: "0,0" }, "error");
  });
});
