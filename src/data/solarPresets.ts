import type { ExclusionList, SolarPreset } from '../types/nasa';

// Curated APOD dates offered as shortcuts next to the date picker.
export const SOLAR_PRESETS: readonly SolarPreset[] = [
  { id: 'saturn-rings-disappear', label: "Saturn's Rings Appear to Disappear", date: '2025-04-29' },
  { id: 'comet-pons-brooks-spring', label: 'Comet Pons-Brooks in Northern Spring', date: '2024-03-09' },
  { id: 'full-moon-2022', label: 'Luvovna Full moon', date: '2022-07-15' },
  { id: 'earth-and-moon', label: 'Earth and the Moon', date: '2021-09-05' },
  { id: 'gw-orionis', label: 'GW Orionis: A Star System with Tilted Rings', date: '2020-09-29' },
  { id: 'ngc-3717', label: 'NGC 3717: A Nearly Sideways Spiral Galaxy', date: '2019-11-12' },
  { id: 'helix-nebula', label: 'NGC 7293: The Helix Nebula', date: '2024-10-24' },
  { id: 'ghost-nebula', label: 'Reflections of the Ghost Nebula', date: '2023-10-30' },
  { id: 'm33-hydrogen-clouds', label: 'Hydrogen Clouds of M33', date: '2023-10-13' },
  { id: 'pons-brooks-ion-tail', label: 'The Changing Ion Tail of Comet Pons-Brooks', date: '2024-04-08' },
  { id: 'large-magellanic-cloud', label: 'The Large Magellanic Cloud Galaxy', date: '2024-10-02' },
  { id: 'athena-to-the-moon', label: 'Athena to the Moon', date: '2025-02-28' },
  { id: 'deimos-before-sunrise', label: 'Deimos Before Sunrise', date: '2025-05-24' },
];

/** Dates whose text trips the keyword match although the picture is deep space. */
export const DEFAULT_EXCLUSIONS: ExclusionList = new Set(['1998-04-01', '2005-07-04']);

export function findPreset(key: string): SolarPreset | undefined {
  const needle = key.trim();
  if (!needle) return undefined;
  return SOLAR_PRESETS.find(preset => preset.id === needle || preset.label === needle);
}
