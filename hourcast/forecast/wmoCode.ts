/**
 * WMO weather interpretation codes as emitted by Open-Meteo.
 */

/**
 * Higher means more significant weather; wins when several hours collapse
 * into one. Unknown codes rank with clear sky.
 */
export function wmoSeverity(code: number): number {
  if (code >= 95 && code <= 99) return 100; // thunderstorm
  if (code >= 80 && code <= 86) return 80; // rain/snow showers
  if (code >= 71 && code <= 77) return 70; // snow
  if (code >= 51 && code <= 67) return 60; // drizzle/rain
  if (code === 45 || code === 48) return 50; // fog
  if (code === 3) return 30; // overcast
  if (code === 2) return 20; // partly cloudy
  if (code === 1) return 10; // mainly clear
  return 0;
}

export function isNightHour(hour: number): boolean {
  return hour < 6 || hour >= 20;
}

export function wmoSymbol(code: number, hour: number): string {
  const night = isNightHour(hour);
  if (code === 0 || code === 1) {
    if (night) return "\u{1F319}"; // crescent moon
    return code === 0 ? "\u{1F31E}" : "\u{1F324}";
  }
  if (code === 2) return night ? "\u{2601}" : "\u{26C5}";
  if (code === 3) return "\u{2601}";
  if (code === 45 || code === 48) return "\u{1F32B}";
  if (code >= 51 && code <= 67) return "\u{1F327}";
  if (code >= 71 && code <= 75) return "\u{2744}";
  if (code === 77 || code === 85 || code === 86) return "\u{1F328}";
  if (code >= 80 && code <= 82) return night ? "\u{1F327}" : "\u{1F326}";
  if (code >= 95 && code <= 99) return "\u{26C8}";
  return "?";
}
