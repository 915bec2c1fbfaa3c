import type { ApodEntry, ExclusionList, SolarBody, SolarVerdict } from '../types/nasa';

export interface SolarClassifier {
  classify(entry: ApodEntry, exclusions: ExclusionList): SolarVerdict;
}

// Plain substring match; "sun" also hits "sunrise", which is accepted.
const SOLAR_KEYWORDS = [
  'mercury', 'venus', 'earth', 'mars', 'jupiter', 'saturn', 'uranus', 'neptune',
  'moon', 'sun', 'comet', 'asteroid', 'aurora',
  'apollo', 'iss', 'viking', 'curiosity', 'cassini', 'voyager', 'juno', 'osiris',
] as const;

// Priority order: first hit wins.
const BODY_PRIORITY: readonly SolarBody[] = [
  'Mercury', 'Venus', 'Mars', 'Jupiter', 'Saturn', 'Uranus', 'Neptune', 'Earth', 'Moon',
];

function mentions(text: string, term: string): boolean {
  return text.includes(term.toLowerCase());
}

export function classifySolarRelevance(entry: ApodEntry, exclusions: ExclusionList): SolarVerdict {
  const title = entry.title.toLowerCase();
  const explanation = entry.explanation.toLowerCase();
  const hit = (term: string) => mentions(title, term) || mentions(explanation, term);

  const isSolar = !exclusions.has(entry.date) && SOLAR_KEYWORDS.some(hit);
  if (!isSolar) return { isSolar: false, primaryBody: 'Sun' };

  return { isSolar: true, primaryBody: BODY_PRIORITY.find(hit) ?? 'Sun' };
}

export const keywordSolarClassifier: SolarClassifier = {
  classify: classifySolarRelevance,
};
