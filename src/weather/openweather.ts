import { fetch, type Dispatcher } from "undici";
import type { ZodType } from "zod";

import { failure, success, type ProviderResult } from "../errors.js";
import { errMessage, type LoggerLike } from "../logging.js";
import {
  currentWeatherPayloadSchema,
  forecastPayloadSchema,
  reverseGeocodePayloadSchema,
  type CurrentWeatherPayload,
  type ForecastPayload
} from "../schemas.js";
import type { Language } from "../types.js";
import type { City, ForecastReport, WeatherProvider, WeatherReport } from "./types.js";

const CURRENT_WEATHER_PATH = "/data/2.5/weather";
const FORECAST_PATH = "/data/2.5/forecast";
const REVERSE_GEOCODE_PATH = "/geo/1.0/reverse";

export type OpenWeatherOptions = {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  logger: LoggerLike;
  /** Overrides undici's global dispatcher, e.g. with a MockAgent. */
  dispatcher?: Dispatcher;
};

function parsePossiblyJson(text: string): { ok: true; json: unknown } | { ok: false } {
  try {
    return { ok: true, json: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function toWeatherReport(payload: CurrentWeatherPayload): WeatherReport {
  const [condition] = payload.weather;
  return {
    cityName: payload.name,
    countryCode: payload.sys.country,
    description: condition.description,
    temperature: payload.main.temp,
    feelsLike: payload.main.feels_like,
    humidityPct: payload.main.humidity,
    windSpeed: payload.wind.speed,
    conditionCode: condition.id
  };
}

function toForecastReport(payload: ForecastPayload): ForecastReport {
  return {
    cityName: payload.city.name,
    countryCode: payload.city.country,
    entries: payload.list.map((item) => ({
      timestamp: item.dt_txt,
      temperature: item.main.temp,
      description: item.weather[0].description,
      conditionCode: item.weather[0].id
    }))
  };
}

export class OpenWeatherClient implements WeatherProvider {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  public constructor(private readonly options: OpenWeatherOptions) {
    this.baseUrl = options.baseUrl ?? "https://api.openweathermap.org";
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  public async fetchCurrentWeather(city: string, lang: Language): Promise<ProviderResult<WeatherReport>> {
    const result = await this.getJson(
      CURRENT_WEATHER_PATH,
      { q: city, units: "metric", lang },
      city,
      currentWeatherPayloadSchema
    );
    return result.ok ? success(toWeatherReport(result.value)) : result;
  }

  public async fetchForecast(city: string, lang: Language): Promise<ProviderResult<ForecastReport>> {
    const result = await this.getJson(FORECAST_PATH, { q: city, units: "metric", lang }, city, forecastPayloadSchema);
    return result.ok ? success(toForecastReport(result.value)) : result;
  }

  public async reverseGeocode(lat: number, lon: number): Promise<ProviderResult<City>> {
    const query = `${lat},${lon}`;
    const result = await this.getJson(
      REVERSE_GEOCODE_PATH,
      { lat: String(lat), lon: String(lon), limit: "1" },
      query,
      reverseGeocodePayloadSchema
    );
    if (!result.ok) {
      return result;
    }

    const [place] = result.value;
    if (!place) {
      return failure({ kind: "not_found", query });
    }
    return success({ name: place.name, country: place.country, lat: place.lat, lon: place.lon });
  }

  private async getJson<T>(
    pathname: string,
    params: Record<string, string>,
    query: string,
    schema: ZodType<T>
  ): Promise<ProviderResult<T>> {
    const { logger } = this.options;
    const url = new URL(pathname, this.baseUrl);
    for (const [key, value] of Object.entries({ ...params, appid: this.options.apiKey })) {
      url.searchParams.set(key, value);
    }

    const fetched = await this.request(url, pathname, query);
    if (!fetched.ok) {
      return fetched;
    }

    const { status, text } = fetched.value;
    if (status === 404) {
      logger.info({ path: pathname, query }, "[WEATHER] nothing found");
      return failure({ kind: "not_found", query });
    }
    if (status < 200 || status >= 300) {
      logger.warn({ path: pathname, query, status }, "[WEATHER] unexpected status");
      return failure({ kind: "provider_unavailable", reason: `HTTP ${status}` });
    }

    const json = parsePossiblyJson(text);
    if (!json.ok) {
      logger.error({ path: pathname, query }, "[WEATHER] response is not JSON");
      return failure({ kind: "malformed_payload", issues: "invalid JSON" });
    }

    const parsed = schema.safeParse(json.json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      logger.error({ path: pathname, query, issues }, "[WEATHER] unexpected payload shape");
      return failure({ kind: "malformed_payload", issues });
    }
    return success(parsed.data);
  }

  private async request(
    url: URL,
    pathname: string,
    query: string
  ): Promise<ProviderResult<{ status: number; text: string }>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await fetch(url, {
        method: "GET",
        signal: controller.signal,
        dispatcher: this.options.dispatcher
      });
      return success({ status: response.status, text: await response.text() });
    } catch (err) {
      this.options.logger.warn({ path: pathname, query, err_message: errMessage(err) }, "[WEATHER] request failed");
      return failure({ kind: "provider_unavailable", reason: errMessage(err) });
    } finally {
      clearTimeout(timeout);
    }
  }
}
