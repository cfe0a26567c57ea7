import type { ImageAssets } from "../assets.js";
import type { WeatherError } from "../errors.js";
import type { ResponseFormatter } from "../formatters/telegram.js";
import type { LocaleStore } from "../locales.js";
import { errMessage, type LoggerLike } from "../logging.js";
import type { SessionStore } from "../sessions.js";
import { LANGUAGE_LABELS, SUPPORTED_LANGUAGES, isLanguage, type Language, type UserId } from "../types.js";
import { aggregate } from "../weather/forecast.js";
import type { WeatherProvider, WeatherReport } from "../weather/types.js";
import { checkCityName } from "./cityName.js";
import { KeyedSerialQueue } from "./userQueue.js";

export const BOT_COMMANDS = ["start", "help", "about", "setlanguage", "weather", "forecast", "location", "cancel"] as const;

export type BotCommand = (typeof BOT_COMMANDS)[number];

function isBotCommand(name: string): name is BotCommand {
  return (BOT_COMMANDS as readonly string[]).includes(name);
}

export type Actor = {
  userId: UserId;
  firstName?: string;
};

export type InboundEvent =
  | { type: "command"; name: string }
  | { type: "text"; text: string }
  | { type: "location"; latitude: number; longitude: number }
  | { type: "callback"; data: string };

export type ReplyChoice = {
  label: string;
  data: string;
};

export type ReplyOptions = {
  /** Ask the client to open a reply to this message. */
  forceReply?: boolean;
  /** One button per row. */
  choices?: ReplyChoice[];
};

/** What the engine needs from the messaging transport for one inbound event. */
export interface ChatReplier {
  text(text: string, options?: ReplyOptions): Promise<void>;
  photo(imagePath: string, caption: string): Promise<void>;
  editMessage(text: string): Promise<void>;
  answerCallback(): Promise<void>;
}

export type ConversationEngineDeps = {
  sessions: SessionStore;
  locales: LocaleStore;
  formatter: ResponseFormatter;
  provider: WeatherProvider;
  images: ImageAssets;
  logger: LoggerLike;
};

type CityFlow = "weather" | "forecast";

const NOT_FOUND_KEY: Record<CityFlow, string> = {
  weather: "weather_not_found",
  forecast: "forecast_not_found"
};

/**
 * Per-user dialog: a command opens a flow, the next text or location reply
 * completes it, and every flow ends back in `idle`.
 */
export class ConversationEngine {
  private readonly queue = new KeyedSerialQueue<UserId>();

  public constructor(private readonly deps: ConversationEngineDeps) {}

  /** Resolves once the reply is sent; never rejects. */
  public handle(actor: Actor, event: InboundEvent, replier: ChatReplier): Promise<void> {
    return this.queue.run(actor.userId, async () => {
      try {
        await this.dispatch(actor, event, replier);
      } catch (err) {
        this.deps.logger.error(
          { userId: actor.userId, event: event.type, err_message: errMessage(err) },
          "[ENGINE] step failed"
        );
        this.deps.sessions.setDialogState(actor.userId, "idle");
        await this.replyQuietly(actor.userId, replier, "processing_error");
      }
    });
  }

  private async dispatch(actor: Actor, event: InboundEvent, replier: ChatReplier): Promise<void> {
    switch (event.type) {
      case "command":
        await this.handleCommand(actor, event.name, replier);
        return;
      case "text":
        await this.handleText(actor, event.text, replier);
        return;
      case "location":
        await this.handleLocation(actor, event.latitude, event.longitude, replier);
        return;
      case "callback":
        await this.handleCallback(actor, event.data, replier);
        return;
    }
  }

  private async handleCommand(actor: Actor, name: string, replier: ChatReplier): Promise<void> {
    const { sessions } = this.deps;
    const language = this.languageOf(actor.userId);

    if (!isBotCommand(name)) {
      await replier.text(this.t(language, "invalid_command"));
      return;
    }

    switch (name) {
      case "start":
        sessions.setDialogState(actor.userId, "idle");
        await replier.text(this.t(language, "welcome", { name: actor.firstName ?? "" }));
        return;
      case "help":
        await replier.text(this.t(language, "help"));
        return;
      case "about":
        await replier.text(this.t(language, "about"));
        return;
      case "setlanguage":
        await replier.text(this.t(language, "choose_language"), {
          choices: SUPPORTED_LANGUAGES.map((code) => ({ label: LANGUAGE_LABELS[code], data: code }))
        });
        return;
      case "weather":
        sessions.setDialogState(actor.userId, "awaiting_city_weather");
        await replier.text(this.t(language, "please_enter_city"), { forceReply: true });
        return;
      case "forecast":
        sessions.setDialogState(actor.userId, "awaiting_city_forecast");
        await replier.text(this.t(language, "please_enter_city"), { forceReply: true });
        return;
      case "location":
        sessions.setDialogState(actor.userId, "awaiting_location");
        await replier.text(this.t(language, "send_location"), { forceReply: true });
        return;
      case "cancel":
        sessions.setDialogState(actor.userId, "idle");
        await replier.text(this.t(language, "cancel"));
        return;
    }
  }

  private async handleText(actor: Actor, text: string, replier: ChatReplier): Promise<void> {
    const session = this.deps.sessions.get(actor.userId);
    switch (session.dialogState) {
      case "idle":
        await replier.text(this.t(session.language, "idle_hint"));
        return;
      case "awaiting_city_weather":
        await this.completeCityFlow(actor, "weather", text, replier);
        return;
      case "awaiting_city_forecast":
        await this.completeCityFlow(actor, "forecast", text, replier);
        return;
      case "awaiting_location":
        this.deps.sessions.setDialogState(actor.userId, "idle");
        await replier.text(this.t(session.language, "invalid_location"));
        return;
    }
  }

  private async handleLocation(actor: Actor, latitude: number, longitude: number, replier: ChatReplier): Promise<void> {
    const { sessions, provider } = this.deps;
    const session = sessions.get(actor.userId);
    const language = session.language;

    if (session.dialogState === "idle") {
      await replier.text(this.t(language, "idle_hint"));
      return;
    }

    sessions.setDialogState(actor.userId, "idle");
    if (session.dialogState !== "awaiting_location") {
      await replier.text(this.t(language, "invalid_city"));
      return;
    }
    if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
      await replier.text(this.t(language, "invalid_location"));
      return;
    }

    const place = await provider.reverseGeocode(latitude, longitude);
    if (!place.ok) {
      const unknownPlace = this.t(language, "unknown_place");
      await this.replyWeatherError(actor.userId, replier, place.error, "weather", unknownPlace);
      return;
    }

    const city = place.value.name;
    const weather = await provider.fetchCurrentWeather(city, language);
    if (!weather.ok) {
      await this.replyWeatherError(actor.userId, replier, weather.error, "weather", city);
      return;
    }
    await this.sendCurrent(replier, weather.value, language);
  }

  private async handleCallback(actor: Actor, data: string, replier: ChatReplier): Promise<void> {
    const { sessions, locales, logger } = this.deps;
    await replier.answerCallback();

    if (isLanguage(data) && locales.has(data)) {
      sessions.setLanguage(actor.userId, data);
      logger.info({ userId: actor.userId, language: data }, "[ENGINE] language changed");
      await replier.editMessage(this.t(data, "set_language_success", { language: LANGUAGE_LABELS[data] }));
      return;
    }

    await replier.editMessage(this.t(this.languageOf(actor.userId), "invalid_language"));
  }

  private async completeCityFlow(actor: Actor, flow: CityFlow, text: string, replier: ChatReplier): Promise<void> {
    const { sessions, provider, formatter } = this.deps;
    const language = this.languageOf(actor.userId);
    sessions.setDialogState(actor.userId, "idle");

    const checked = checkCityName(text.trim());
    if (!checked.ok) {
      this.deps.logger.debug({ userId: actor.userId, input: checked.error.input }, "[ENGINE] invalid city name");
      await replier.text(this.t(language, "invalid_city"));
      return;
    }

    const { city } = checked;
    if (flow === "weather") {
      const result = await provider.fetchCurrentWeather(city, language);
      if (!result.ok) {
        await this.replyWeatherError(actor.userId, replier, result.error, flow, city);
        return;
      }
      await this.sendCurrent(replier, result.value, language);
      return;
    }

    const result = await provider.fetchForecast(city, language);
    if (!result.ok) {
      await this.replyWeatherError(actor.userId, replier, result.error, flow, city);
      return;
    }
    const { cityName, countryCode, entries } = result.value;
    await replier.text(formatter.formatForecast(cityName, countryCode, aggregate(entries), language));
  }

  private async sendCurrent(replier: ChatReplier, report: WeatherReport, language: Language): Promise<void> {
    const { text, imageKey } = this.deps.formatter.formatCurrent(report, language);
    const imagePath = this.deps.images.resolve(imageKey);
    if (imagePath) {
      try {
        await replier.photo(imagePath, text);
        return;
      } catch (err) {
        this.deps.logger.warn(
          { imageKey, imagePath, err_message: errMessage(err) },
          "[ENGINE] photo reply failed, fallback to text"
        );
      }
    }
    await replier.text(text);
  }

  private async replyWeatherError(
    userId: UserId,
    replier: ChatReplier,
    error: WeatherError,
    flow: CityFlow,
    city: string
  ): Promise<void> {
    const language = this.languageOf(userId);
    switch (error.kind) {
      case "provider_unavailable":
        await replier.text(this.t(language, "api_error"));
        return;
      case "not_found":
        await replier.text(this.t(language, NOT_FOUND_KEY[flow], { city }));
        return;
      case "malformed_payload":
        this.deps.logger.error({ userId, flow, city, issues: error.issues }, "[ENGINE] weather payload rejected");
        await replier.text(this.t(language, "processing_error"));
        return;
    }
  }

  private async replyQuietly(userId: UserId, replier: ChatReplier, key: string): Promise<void> {
    try {
      await replier.text(this.t(this.languageOf(userId), key));
    } catch (err) {
      this.deps.logger.error({ userId, key, err_message: errMessage(err) }, "[ENGINE] failed to send error reply");
    }
  }

  private languageOf(userId: UserId): Language {
    return this.deps.sessions.get(userId).language;
  }

  private t(language: string, key: string, placeholders?: Record<string, string | number>): string {
    return this.deps.formatter.message(language, key, placeholders);
  }
}
