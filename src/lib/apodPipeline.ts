import { createApodClient, type ApodClient } from '../api/fetch_apod';
import type { FetchLike } from '../api/nasaClient';
import type { ApodConfig } from '../config';
import { DEFAULT_EXCLUSIONS } from '../data/solarPresets';
import type { ApodEntry, DateSelection, ExclusionList, SolarVerdict } from '../types/nasa';
import { ApodCache } from '../utils/apodCache';
import { buildSolarDiagram, type SolarDiagram } from '../visuals/solarDiagram';
import { resolveDateSelection } from './dateResolver';
import { keywordSolarClassifier, type SolarClassifier } from './solarClassifier';

export interface ApodRequest {
  manualDate?: string | null;
  presetKey?: string | null;
}

export interface ApodPipelineContext {
  client: ApodClient;
  cache: ApodCache;
  classifier: SolarClassifier;
  exclusions: ExclusionList;
  /** Clock used to decide what "today" is; defaults to the current time. */
  now?: () => Date;
}

export interface ApodResult {
  selection: DateSelection;
  entry: ApodEntry;
  verdict: SolarVerdict;
  /** Only built for solar-system entries. */
  diagram: SolarDiagram | null;
}

export async function runApodPipeline(req: ApodRequest, ctx: ApodPipelineContext): Promise<ApodResult> {
  const now = ctx.now ? ctx.now() : new Date();
  const selection = resolveDateSelection(req.manualDate, req.presetKey, now);
  const entry = await ctx.cache.getOrFetch(selection, s => ctx.client.fetch(s));
  const verdict = ctx.classifier.classify(entry, ctx.exclusions);
  const diagram = verdict.isSolar ? buildSolarDiagram(verdict.primaryBody) : null;
  return { selection, entry, verdict, diagram };
}

export function createApodPipeline(
  config: ApodConfig,
  overrides: Partial<ApodPipelineContext> & { fetchImpl?: FetchLike } = {},
): { context: ApodPipelineContext; run: (req: ApodRequest) => Promise<ApodResult> } {
  const { fetchImpl, ...rest } = overrides;
  const context: ApodPipelineContext = {
    client: createApodClient({
      apiKey: config.apiKey,
      endpoint: config.apodUrl,
      timeoutMs: config.timeoutMs,
      fetchImpl,
    }),
    cache: new ApodCache({ ttlSeconds: config.cacheTtlSeconds }),
    classifier: keywordSolarClassifier,
    exclusions: DEFAULT_EXCLUSIONS,
    ...rest,
  };
  return { context, run: req => runApodPipeline(req, context) };
}
