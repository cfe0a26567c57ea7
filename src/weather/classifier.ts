export const IMAGE_KEYS = ["thunderstorm", "drizzle", "rain", "snow", "mist", "clear", "clouds", "default"] as const;

export type ImageKey = (typeof IMAGE_KEYS)[number];

export type WeatherCategory = "thunderstorm" | "drizzle" | "rain" | "snow" | "mist" | "clear" | "clouds" | "unknown";

export type WeatherPresentation = {
  category: WeatherCategory;
  emoji: string;
  imageKey: ImageKey;
};

const PRESENTATION: Record<WeatherCategory, WeatherPresentation> = {
  thunderstorm: { category: "thunderstorm", emoji: "⛈️", imageKey: "thunderstorm" },
  drizzle: { category: "drizzle", emoji: "🌦️", imageKey: "drizzle" },
  rain: { category: "rain", emoji: "🌧️", imageKey: "rain" },
  snow: { category: "snow", emoji: "❄️", imageKey: "snow" },
  mist: { category: "mist", emoji: "🌫️", imageKey: "mist" },
  clear: { category: "clear", emoji: "☀️", imageKey: "clear" },
  clouds: { category: "clouds", emoji: "☁️", imageKey: "clouds" },
  unknown: { category: "unknown", emoji: "🌈", imageKey: "default" }
};

// Ranges follow the OpenWeather condition-code groups; 800 alone is clear sky.
export function categorize(conditionCode: number): WeatherCategory {
  if (conditionCode >= 200 && conditionCode < 300) return "thunderstorm";
  if (conditionCode >= 300 && conditionCode < 400) return "drizzle";
  if (conditionCode >= 500 && conditionCode < 600) return "rain";
  if (conditionCode >= 600 && conditionCode < 700) return "snow";
  if (conditionCode >= 700 && conditionCode < 800) return "mist";
  if (conditionCode === 800) return "clear";
  if (conditionCode > 800 && conditionCode < 900) return "clouds";
  return "unknown";
}

export function classify(conditionCode: number): WeatherPresentation {
  return PRESENTATION[categorize(conditionCode)];
}
