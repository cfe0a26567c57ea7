import type { LocaleStore, Placeholders } from "../locales.js";
import { classify, type ImageKey } from "../weather/classifier.js";
import type { ForecastSummary, WeatherReport } from "../weather/types.js";

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function capitalize(text: string): string {
  if (text === "") {
    return text;
  }
  return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
}

function escapePlaceholders(placeholders: Placeholders): Placeholders {
  const escaped: Placeholders = {};
  for (const [key, value] of Object.entries(placeholders)) {
    escaped[key] = typeof value === "string" ? escapeHtml(value) : value;
  }
  return escaped;
}

export type FormattedCurrent = {
  text: string;
  imageKey: ImageKey;
};

/**
 * Turns weather data into Telegram HTML. Templates come from the locale
 * files; every substituted value is escaped here.
 */
export class ResponseFormatter {
  public constructor(private readonly locales: LocaleStore) {}

  public message(language: string, key: string, placeholders: Placeholders = {}): string {
    return this.locales.resolve(language, key, escapePlaceholders(placeholders));
  }

  public formatCurrent(report: WeatherReport, language: string): FormattedCurrent {
    const { emoji, imageKey } = classify(report.conditionCode);
    const lines = [
      this.message(language, "current_header", { emoji, city: report.cityName, country: report.countryCode }),
      this.message(language, "current_temperature", { temp: report.temperature, feels_like: report.feelsLike }),
      this.message(language, "current_humidity", { humidity: report.humidityPct }),
      this.message(language, "current_wind", { wind: report.windSpeed }),
      this.message(language, "current_description", { description: capitalize(report.description) })
    ];
    return { text: lines.join("\n"), imageKey };
  }

  public formatForecast(city: string, country: string, summaries: Iterable<ForecastSummary>, language: string): string {
    const blocks = [this.message(language, "forecast_header", { city, country })];
    for (const summary of summaries) {
      const { emoji } = classify(summary.dominantConditionCode);
      blocks.push(
        [
          this.message(language, "forecast_day", {
            date: summary.calendarDay,
            emoji,
            description: capitalize(summary.dominantDescription)
          }),
          this.message(language, "forecast_temperature", { min: summary.minTemp, max: summary.maxTemp })
        ].join("\n")
      );
    }
    return blocks.join("\n\n");
  }
}
