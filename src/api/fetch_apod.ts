import type { Apod, ApodEntry, DateSelection, MediaType } from '../types/nasa';
import { isCalendarDate } from '../time';
import { MalformedResponseError } from './errors';
import { request, type FetchLike } from './nasaClient';

export const APOD_URL = 'https://api.nasa.gov/planetary/apod';

export interface ApodClientOptions {
  apiKey: string;
  endpoint?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function nonEmpty(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

function toMediaType(raw: unknown): MediaType {
  // Entries without media_type are images.
  if (raw === undefined || raw === null) return 'image';
  if (raw === 'image' || raw === 'video') return raw;
  return 'other';
}

/** Builds a frozen entry from a decoded APOD payload, or throws if any required field is missing. */
export function parseApod(payload: unknown, url: string, bodyText = ''): ApodEntry {
  if (!isRecord(payload)) {
    throw new MalformedResponseError(url, [], bodyText);
  }

  const record = payload;
  const missing: Array<keyof Apod> = [];
  const field = (key: keyof Apod, valid: (value: unknown) => value is string): string => {
    const value = record[key];
    if (valid(value)) return value;
    missing.push(key);
    return '';
  };

  const date = field('date', (v): v is string => nonEmpty(v) && isCalendarDate(v));
  const title = field('title', nonEmpty);
  // An empty explanation is still an explanation.
  const explanation = field('explanation', (v): v is string => typeof v === 'string');
  const mediaUrl = field('url', nonEmpty);

  if (missing.length) {
    throw new MalformedResponseError(url, missing, bodyText);
  }

  const mediaType = toMediaType(record.media_type);
  const { hdurl } = record;
  const entry: ApodEntry = {
    date,
    title,
    explanation,
    mediaType,
    mediaUrl,
    ...(mediaType === 'image' && nonEmpty(hdurl) ? { hdUrl: hdurl } : {}),
  };
  return Object.freeze(entry);
}

export async function fetchApod(selection: DateSelection, options: ApodClientOptions): Promise<ApodEntry> {
  const { apiKey, endpoint = APOD_URL, timeoutMs, signal, fetchImpl } = options;
  const res = await request(
    endpoint,
    { api_key: apiKey, date: selection.kind === 'date' ? selection.date : undefined },
    { timeoutMs, signal, fetchImpl },
  );
  return parseApod(res.data, res.url, res.text);
}

export interface ApodClient {
  fetch(selection: DateSelection): Promise<ApodEntry>;
}

export function createApodClient(options: ApodClientOptions): ApodClient {
  return {
    fetch: selection => fetchApod(selection, options),
  };
}
