import type { ProviderResult } from "../errors.js";
import type { Language } from "../types.js";

export type WeatherReport = {
  cityName: string;
  countryCode: string;
  description: string;
  temperature: number;
  feelsLike: number;
  humidityPct: number;
  windSpeed: number;
  conditionCode: number;
};

/** One 3-hour slot; `timestamp` is the provider's local "YYYY-MM-DD HH:MM:SS". */
export type ForecastEntry = {
  timestamp: string;
  temperature: number;
  description: string;
  conditionCode: number;
};

export type ForecastReport = {
  cityName: string;
  countryCode: string;
  entries: ForecastEntry[];
};

export type ForecastSummary = {
  readonly calendarDay: string;
  readonly minTemp: number;
  readonly maxTemp: number;
  readonly dominantDescription: string;
  readonly dominantConditionCode: number;
};

export type City = {
  name: string;
  country?: string;
  lat: number;
  lon: number;
};

export interface WeatherProvider {
  fetchCurrentWeather(city: string, lang: Language): Promise<ProviderResult<WeatherReport>>;
  fetchForecast(city: string, lang: Language): Promise<ProviderResult<ForecastReport>>;
  reverseGeocode(lat: number, lon: number): Promise<ProviderResult<City>>;
}
