// Pipeline tunables, read through effect's Config (environment by default).

import { Config, Context, Duration, Layer } from "effect";

export interface PipelineSettings {
  /** Provider ids in descending priority. */
  readonly providers: ReadonlyArray<string>;
  readonly providerTimeout: Duration.Duration;
  readonly retryCount: number;
  readonly retryBaseDelay: Duration.Duration;
  readonly providerCooldown: Duration.Duration;
  readonly realtimeTtl: Duration.Duration;
  readonly delayedTtl: Duration.Duration;
  readonly searchTtl: Duration.Duration;
  readonly sweepInterval: Duration.Duration;
  readonly searchResultLimit: number;
  readonly searchDebounce: Duration.Duration;
}

export const defaultSettings: PipelineSettings = {
  providers: ["rapidapi", "yahoo", "alphavantage"],
  providerTimeout: Duration.seconds(8),
  retryCount: 2,
  retryBaseDelay: Duration.millis(500),
  providerCooldown: Duration.minutes(10),
  realtimeTtl: Duration.minutes(5),
  delayedTtl: Duration.minutes(10),
  searchTtl: Duration.hours(1),
  sweepInterval: Duration.minutes(30),
  searchResultLimit: 5,
  searchDebounce: Duration.millis(300),
};

const settingsConfig: Config.Config<PipelineSettings> = Config.all({
  providers: Config.array(Config.string(), "QUOTE_PROVIDERS").pipe(
    Config.withDefault(defaultSettings.providers),
  ),
  providerTimeout: Config.duration("PROVIDER_TIMEOUT").pipe(
    Config.withDefault(defaultSettings.providerTimeout),
  ),
  retryCount: Config.integer("RETRY_COUNT").pipe(
    Config.validate({
      message: "RETRY_COUNT must be zero or more",
      validation: (n) => n >= 0,
    }),
    Config.withDefault(defaultSettings.retryCount),
  ),
  retryBaseDelay: Config.duration("RETRY_BASE_DELAY").pipe(
    Config.withDefault(defaultSettings.retryBaseDelay),
  ),
  providerCooldown: Config.duration("PROVIDER_COOLDOWN").pipe(
    Config.withDefault(defaultSettings.providerCooldown),
  ),
  realtimeTtl: Config.duration("CACHE_TTL_REALTIME").pipe(
    Config.withDefault(defaultSettings.realtimeTtl),
  ),
  delayedTtl: Config.duration("CACHE_TTL_DELAYED").pipe(
    Config.withDefault(defaultSettings.delayedTtl),
  ),
  searchTtl: Config.duration("CACHE_TTL_SEARCH").pipe(
    Config.withDefault(defaultSettings.searchTtl),
  ),
  sweepInterval: Config.duration("CACHE_SWEEP_INTERVAL").pipe(
    Config.withDefault(defaultSettings.sweepInterval),
  ),
  searchResultLimit: Config.integer("SEARCH_RESULT_LIMIT").pipe(
    Config.validate({
      message: "SEARCH_RESULT_LIMIT must be positive",
      validation: (n) => n > 0,
    }),
    Config.withDefault(defaultSettings.searchResultLimit),
  ),
  searchDebounce: Config.duration("SEARCH_DEBOUNCE").pipe(
    Config.withDefault(defaultSettings.searchDebounce),
  ),
});

export class Settings extends Context.Tag("Settings")<
  Settings,
  PipelineSettings
>() {}

export const SettingsLive = Layer.effect(Settings, settingsConfig);

export const settingsLayer = (overrides: Partial<PipelineSettings> = {}) =>
  Layer.succeed(Settings, { ...defaultSettings, ...overrides });
