import { readFileSync } from "node:fs";
import path from "node:path";

import { errMessage, type LoggerLike } from "./logging.js";
import { localeTableSchema } from "./schemas.js";
import { DEFAULT_LANGUAGE, SUPPORTED_LANGUAGES, isLanguage, type Language } from "./types.js";

export const FALLBACK_MESSAGE = "Something went wrong. Please try again later.";

export type LocaleTable = ReadonlyMap<string, string>;

export type Placeholders = Record<string, string | number>;

/** Replaces `{name}` tokens; tokens without a value are left as they are. */
export function fillTemplate(template: string, placeholders: Placeholders = {}): string {
  return template.replace(/\{(\w+)\}/g, (token: string, name: string) =>
    Object.hasOwn(placeholders, name) ? String(placeholders[name]) : token
  );
}

export class LocaleStore {
  private readonly tables: ReadonlyMap<Language, LocaleTable>;

  public constructor(tables: ReadonlyMap<Language, LocaleTable>) {
    this.tables = tables;
  }

  /**
   * Reads `<dir>/<code>.json` for every supported language. A file that is
   * missing or is not a flat string map is logged and skipped.
   */
  public static load(dir: string, logger: LoggerLike): LocaleStore {
    const tables = new Map<Language, LocaleTable>();
    for (const language of SUPPORTED_LANGUAGES) {
      const file = path.join(dir, `${language}.json`);
      try {
        const parsed = localeTableSchema.parse(JSON.parse(readFileSync(file, "utf8")));
        tables.set(language, new Map(Object.entries(parsed)));
      } catch (err) {
        logger.error({ language, file, err_message: errMessage(err) }, "[LOCALE] language file missing or invalid");
      }
    }
    logger.info({ languages: [...tables.keys()] }, "[LOCALE] languages loaded");
    return new LocaleStore(tables);
  }

  public get languages(): Language[] {
    return [...this.tables.keys()];
  }

  public has(language: string): boolean {
    return isLanguage(language) && this.tables.has(language);
  }

  /** Never throws: falls back to the Russian table, then to a fixed English message. */
  public resolve(language: string, key: string, placeholders?: Placeholders): string {
    const own = isLanguage(language) ? this.tables.get(language)?.get(key) : undefined;
    const template = own ?? this.tables.get(DEFAULT_LANGUAGE)?.get(key) ?? FALLBACK_MESSAGE;
    return fillTemplate(template, placeholders);
  }
}
