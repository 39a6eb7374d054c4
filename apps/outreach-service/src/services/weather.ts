import weatherPhrases from "../data/weather-phrases.json";

interface WeatherPhrase {
  match: string;
  phrase: string;
}

// Table order is significant: the substring pass returns the first hit
const PHRASES: readonly WeatherPhrase[] = weatherPhrases;

const EXACT = new Map<string, string>();
for (const { match, phrase } of PHRASES) {
  if (!EXACT.has(match)) EXACT.set(match, phrase);
}

// Last-resort keyword checks, in priority order
const KEYWORD_FALLBACKS: Array<{ keywords: string[]; phrase: string }> = [
  { keywords: ["rain"], phrase: "rainy weather" },
  { keywords: ["snow"], phrase: "snowy weather" },
  { keywords: ["cloud"], phrase: "cloudy weather" },
  { keywords: ["clear", "sun"], phrase: "sunny weather" },
  { keywords: ["storm", "thunder"], phrase: "stormy weather" },
  { keywords: ["fog", "mist"], phrase: "foggy weather" },
];

export const DEFAULT_WEATHER_PHRASE = "pleasant weather";

/**
 * Turn a provider weather description ("Overcast Clouds") into a phrase
 * that reads naturally in an email ("cloudy weather").
 *
 * exact match -> first table key contained in the input -> keyword -> default
 */
export function normalizeWeather(description: string): string {
  const text = description.toLowerCase().trim();

  const exact = EXACT.get(text);
  if (exact !== undefined) return exact;

  for (const { match, phrase } of PHRASES) {
    if (text.includes(match)) return phrase;
  }

  for (const { keywords, phrase } of KEYWORD_FALLBACKS) {
    if (keywords.some(k => text.includes(k))) return phrase;
  }

  return DEFAULT_WEATHER_PHRASE;
}
