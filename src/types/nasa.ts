// Raw APOD payload as returned by api.nasa.gov
export interface Apod {
  date: string;
  title: string;
  explanation: string;
  hdurl?: string;
  media_type?: 'image' | 'video' | string;
  url: string;
  service_version?: string;
  copyright?: string;
  thumbnail_url?: string; // present when thumbs=true
}

export type MediaType = 'image' | 'video' | 'other';

export interface ApodEntry {
  readonly date: string;
  readonly title: string;
  readonly explanation: string;
  readonly mediaType: MediaType;
  readonly mediaUrl: string;
  /** Only set for images that NASA also publishes in high resolution. */
  readonly hdUrl?: string;
}

export type DateSelection = { kind: 'latest' } | { kind: 'date'; date: string };

export const SOLAR_BODIES = [
  'Sun',
  'Mercury',
  'Venus',
  'Earth',
  'Mars',
  'Jupiter',
  'Saturn',
  'Uranus',
  'Neptune',
  'Moon',
] as const;

export type SolarBody = (typeof SOLAR_BODIES)[number];

export interface SolarVerdict {
  isSolar: boolean;
  primaryBody: SolarBody;
}

export type ExclusionList = ReadonlySet<string>;

export interface SolarPreset {
  id: string;
  label: string;
  date: string;
}
