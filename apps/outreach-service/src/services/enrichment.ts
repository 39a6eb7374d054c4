import demographics from "../data/demographics.json";
import { EnrichmentMeta, EnrichmentSignal } from "../types/lead";
import { isRecord } from "../lib/guards";

export interface LeadLocation {
  city: string;
  state: string;
  country: string;
}

export interface WeatherReading {
  temperature: number;
  weather_description: string;
}

/**
 * Current-conditions source for a location
 */
export interface WeatherProvider {
  readonly name: "openweather";
  getWeather(location: LeadLocation): Promise<WeatherReading>;
}

/**
 * Enrichment result - signal for scoring plus where each half came from
 */
export interface EnrichmentResult {
  signal: EnrichmentSignal;
  meta: EnrichmentMeta;
  durationMs: number;
}

type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<{
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}>;

const OPENWEATHER_URL = "https://api.openweathermap.org/data/2.5/weather";
const REQUEST_TIMEOUT_MS = 10_000;

const DEFAULT_DEMOGRAPHICS = { population: 5_000_000, medianIncome: 55_000, percentRenters: 40 };
const DEFAULT_WEATHER: WeatherReading = { temperature: 65, weather_description: "mild" };

/**
 * Enrich a lead's location with weather + demographic signals.
 * Weather falls back to a climate estimate when the provider is missing or fails.
 */
export async function enrichLocation(
  location: LeadLocation,
  weatherProvider: WeatherProvider | null
): Promise<EnrichmentResult> {
  const startTime = Date.now();
  const errors: string[] = [];

  console.log(`[enrichment] Enriching: ${location.city}, ${location.state}, ${location.country}`);

  let weather: WeatherReading | null = null;
  if (weatherProvider) {
    try {
      weather = await weatherProvider.getWeather(location);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      console.warn(`[enrichment] Weather provider failed, using estimate:`, message);
      errors.push(`Weather API: ${message}`);
    }
  } else {
    errors.push("Weather API: not configured");
  }

  const weatherSource: EnrichmentMeta["weather_source"] = weather ? "openweather" : "estimate";
  const reading = weather ?? estimateWeather(location);
  const demo = estimateDemographics(location);

  return {
    signal: {
      temperature: reading.temperature,
      weather_description: reading.weather_description,
      median_income: demo.medianIncome,
      population: demo.population,
      percent_renters: demo.percentRenters,
    },
    meta: {
      weather_source: weatherSource,
      demographics_source: "table",
      enriched_at: new Date().toISOString(),
      errors,
    },
    durationMs: Date.now() - startTime,
  };
}

// ============================================================================
// OPENWEATHER
// ============================================================================

/**
 * OpenWeather current conditions, imperial units
 * @see https://openweathermap.org/current
 */
export class OpenWeatherProvider implements WeatherProvider {
  readonly name = "openweather";

  constructor(
    private apiKey: string,
    private fetchImpl: FetchLike = fetch
  ) {}

  async getWeather(location: LeadLocation): Promise<WeatherReading> {
    const params = new URLSearchParams({
      q: `${location.city},${location.state},${location.country}`,
      appid: this.apiKey,
      units: "imperial",
    });

    const response = await this.fetchImpl(`${OPENWEATHER_URL}?${params.toString()}`, {
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });

    if (!response.ok) {
      throw new Error(`OpenWeather request failed with status ${response.status}`);
    }

    return parseOpenWeatherResponse(await response.json());
  }
}

export function parseOpenWeatherResponse(body: unknown): WeatherReading {
  if (!isRecord(body) || !isRecord(body.main) || !Array.isArray(body.weather)) {
    throw new Error("Unexpected response format from OpenWeather API");
  }

  const temp = body.main.temp;
  const first: unknown = body.weather[0];
  const description = isRecord(first) ? first.description : undefined;

  if (typeof temp !== "number" || typeof description !== "string") {
    throw new Error("Unexpected response format from OpenWeather API");
  }

  return {
    temperature: Math.round(temp),
    weather_description: toTitleCase(description),
  };
}

export function createWeatherProvider(config: { openWeatherApiKey: string }): WeatherProvider | null {
  if (!config.openWeatherApiKey) return null;
  return new OpenWeatherProvider(config.openWeatherApiKey);
}

// ============================================================================
// TABLE ESTIMATES
// ============================================================================

type ClimateEntry = { temperature: number; description: string };
type StateEntry = { population: number; medianIncome: number; percentRenters: number };

const CITY_WEATHER: Record<string, ClimateEntry | undefined> = demographics.cityWeather;
const STATE_WEATHER: Record<string, ClimateEntry | undefined> = demographics.stateWeather;
const STATES: Record<string, StateEntry | undefined> = demographics.states;
const CITY_RENTERS: Record<string, number | undefined> = demographics.cityRenters;

/**
 * Typical conditions by city, then state
 */
export function estimateWeather(location: LeadLocation): WeatherReading {
  const entry =
    CITY_WEATHER[location.city.trim().toLowerCase()] ??
    STATE_WEATHER[location.state.trim().toUpperCase()];

  if (!entry) return { ...DEFAULT_WEATHER };
  return { temperature: entry.temperature, weather_description: entry.description };
}

/**
 * State population and income; renter share by city, then state
 */
export function estimateDemographics(location: LeadLocation): StateEntry {
  const state = STATES[location.state.trim().toUpperCase()];
  const cityRenters = CITY_RENTERS[location.city.trim().toLowerCase()];

  return {
    population: state?.population ?? DEFAULT_DEMOGRAPHICS.population,
    medianIncome: state?.medianIncome ?? DEFAULT_DEMOGRAPHICS.medianIncome,
    percentRenters: cityRenters ?? state?.percentRenters ?? DEFAULT_DEMOGRAPHICS.percentRenters,
  };
}

// ============================================================================
// HELPERS
// ============================================================================

function toTitleCase(text: string): string {
  return text.replace(/\b\w/g, c => c.toUpperCase());
}
