export const WMO_CODE_LABELS: Record<number, string> = {
  0: 'Clear sky',
  1: 'Mainly clear',
  2: 'Partly cloudy',
  3: 'Overcast',
  45: 'Fog',
  48: 'Rime fog',
  51: 'Light drizzle',
  53: 'Moderate drizzle',
  55: 'Dense drizzle',
  61: 'Slight rain',
  63: 'Moderate rain',
  65: 'Heavy rain',
  71: 'Slight snow',
  73: 'Moderate snow',
  75: 'Heavy snow',
  77: 'Snow grains',
  80: 'Slight rain showers',
  81: 'Moderate rain showers',
  82: 'Violent rain showers',
  85: 'Slight snow showers',
  86: 'Heavy snow showers',
  95: 'Thunderstorm',
  96: 'Thunderstorm with slight hail',
  99: 'Thunderstorm with heavy hail',
};

export const describeWeatherCode = (code: number): string => WMO_CODE_LABELS[code] || `Code ${code}`;

export type WeatherSymbol = 'sun' | 'cloud' | 'fog' | 'rain' | 'snow' | 'storm';

export const WEATHER_SYMBOL_GLYPHS: Record<WeatherSymbol, string> = {
  sun: '☀',
  cloud: '☁',
  fog: '🌫',
  rain: '🌧',
  snow: '❄',
  storm: '⛈',
};

const SYMBOL_CODES: [WeatherSymbol, number[]][] = [
  ['sun', [0]],
  ['cloud', [1, 2, 3]],
  ['fog', [45, 48]],
  ['rain', [51, 53, 55, 61, 63, 65, 80, 81, 82]],
  ['snow', [71, 73, 75, 77, 85, 86]],
  ['storm', [95, 96, 99]],
];

// Anything unlisted renders as cloud.
export const weatherSymbolForCode = (code: number): WeatherSymbol => {
  const match = SYMBOL_CODES.find(([, codes]) => codes.includes(code));
  return match ? match[0] : 'cloud';
};
