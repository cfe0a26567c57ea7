/** Malformed user input, resolved locally without a provider call. */
export type ValidationError = {
  kind: "validation";
  field: "city" | "location";
  input: string;
};

/** Network failure, timeout or an unexpected HTTP status. */
export type ProviderUnavailable = {
  kind: "provider_unavailable";
  reason: string;
};

/** The provider answered, but has nothing for the query. */
export type NotFound = {
  kind: "not_found";
  query: string;
};

/** A successful response that lacks a field the bot needs. */
export type MalformedPayload = {
  kind: "malformed_payload";
  issues: string;
};

export type WeatherError = ProviderUnavailable | NotFound | MalformedPayload;

export type ProviderResult<T> = { ok: true; value: T } | { ok: false; error: WeatherError };

export function success<T>(value: T): ProviderResult<T> {
  return { ok: true, value };
}

export function failure<T = never>(error: WeatherError): ProviderResult<T> {
  return { ok: false, error };
}
