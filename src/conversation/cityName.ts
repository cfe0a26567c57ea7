import type { ValidationError } from "../errors.js";

// Words of 2+ Latin/Cyrillic letters or hyphens, one whitespace character between words.
const CITY_NAME_PATTERN = /^[A-Za-zА-Яа-яЁё-]{2,}(?:\s[A-Za-zА-Яа-яЁё-]{2,})*$/;

export function isValidCityName(input: string): boolean {
  return CITY_NAME_PATTERN.test(input);
}

export function checkCityName(input: string): { ok: true; city: string } | { ok: false; error: ValidationError } {
  if (isValidCityName(input)) {
    return { ok: true, city: input };
  }
  return { ok: false, error: { kind: "validation", field: "city", input } };
}
