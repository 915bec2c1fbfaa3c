export * from './api/errors';
export { APOD_URL, createApodClient, fetchApod, parseApod, type ApodClient, type ApodClientOptions } from './api/fetch_apod';
export { DEFAULT_TIMEOUT_MS, redactKey, request, type FetchLike } from './api/nasaClient';
export { loadConfig, type ApodConfig } from './config';
export { DEFAULT_EXCLUSIONS, SOLAR_PRESETS, findPreset } from './data/solarPresets';
export {
  createApodPipeline,
  runApodPipeline,
  type ApodPipelineContext,
  type ApodRequest,
  type ApodResult,
} from './lib/apodPipeline';
export { resolveDateSelection } from './lib/dateResolver';
export { classifySolarRelevance, keywordSolarClassifier, type SolarClassifier } from './lib/solarClassifier';
export { APOD_FIRST_DATE } from './time';
export {
  SOLAR_BODIES,
  type Apod,
  type ApodEntry,
  type DateSelection,
  type ExclusionList,
  type MediaType,
  type SolarBody,
  type SolarPreset,
  type SolarVerdict,
} from './types/nasa';
export { ApodCache, DEFAULT_CACHE_TTL_SECONDS, selectionKey, type CacheStats } from './utils/apodCache';
export { buildSolarDiagram, projectSolarDiagram, type SolarDiagram } from './visuals/solarDiagram';
