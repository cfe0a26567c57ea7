import type { ForecastEntry, WeatherReport } from "../../src/weather/types.js";

export function sampleReport(overrides: Partial<WeatherReport> = {}): WeatherReport {
  return {
    cityName: "Paris",
    countryCode: "FR",
    description: "light rain",
    temperature: 12.5,
    feelsLike: 11.3,
    humidityPct: 81,
    windSpeed: 4.1,
    conditionCode: 500,
    ...overrides
  };
}

export function entry(timestamp: string, temperature: number, description = "clear sky", conditionCode = 800): ForecastEntry {
  return { timestamp, temperature, description, conditionCode };
}

/** Eight 3-hour slots per day starting at 00:00, temperatures 10..17 on every day. */
export function threeHourEntries(days: string[]): ForecastEntry[] {
  const entries: ForecastEntry[] = [];
  for (const day of days) {
    for (let slot = 0; slot < 8; slot += 1) {
      const hour = String(slot * 3).padStart(2, "0");
      entries.push(entry(`${day} ${hour}:00:00`, 10 + slot, slot < 5 ? "light rain" : "overcast clouds", slot < 5 ? 500 : 804));
    }
  }
  return entries;
}

export function currentWeatherPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    cod: 200,
    name: "Paris",
    sys: { country: "FR" },
    weather: [{ id: 500, main: "Rain", description: "light rain" }],
    main: { temp: 12.5, feels_like: 11.3, humidity: 81, pressure: 1012 },
    wind: { speed: 4.1, deg: 220 },
    ...overrides
  };
}

export function forecastPayload(entries: ForecastEntry[]): Record<string, unknown> {
  return {
    cod: "200",
    cnt: entries.length,
    city: { name: "Oslo", country: "NO" },
    list: entries.map((e) => ({
      dt_txt: e.timestamp,
      main: { temp: e.temperature },
      weather: [{ id: e.conditionCode, description: e.description }]
    }))
  };
}
