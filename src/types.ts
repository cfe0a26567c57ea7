export const SUPPORTED_LANGUAGES = ["ru", "en", "es"] as const;

export type Language = (typeof SUPPORTED_LANGUAGES)[number];

export const DEFAULT_LANGUAGE: Language = "ru";

export const LANGUAGE_LABELS: Record<Language, string> = {
  ru: "Русский",
  en: "English",
  es: "Español"
};

export function isLanguage(value: string): value is Language {
  return (SUPPORTED_LANGUAGES as readonly string[]).includes(value);
}

export type UserId = number;

export type DialogState = "idle" | "awaiting_city_weather" | "awaiting_city_forecast" | "awaiting_location";

export type UserSession = {
  userId: UserId;
  language: Language;
  dialogState: DialogState;
};
