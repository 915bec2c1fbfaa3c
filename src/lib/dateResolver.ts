import { InvalidDateError } from '../api/errors';
import { findPreset } from '../data/solarPresets';
import { APOD_FIRST_DATE, isCalendarDate, utcYMD } from '../time';
import type { DateSelection } from '../types/nasa';

/**
 * Turns the date picker value and the preset dropdown into one lookup key.
 * A known preset overrides the manual date; today's date becomes `latest`
 * so the API serves its current entry.
 */
export function resolveDateSelection(
  manualDate?: string | null,
  presetKey?: string | null,
  now: Date = new Date(),
): DateSelection {
  const today = utcYMD(now);
  const preset = presetKey ? findPreset(presetKey) : undefined;

  let date: string;
  if (preset) {
    date = preset.date;
    if (date > today) {
      throw new InvalidDateError(date, `preset "${preset.label}" is after today (${today})`);
    }
  } else if (manualDate == null || manualDate.trim() === '') {
    date = today;
  } else {
    date = manualDate.trim();
    if (!isCalendarDate(date)) {
      throw new InvalidDateError(manualDate, 'expected a calendar date as YYYY-MM-DD');
    }
    // YYYY-MM-DD compares correctly as a string
    if (date < APOD_FIRST_DATE) {
      throw new InvalidDateError(manualDate, `APOD has no entries before ${APOD_FIRST_DATE}`);
    }
    if (date > today) {
      throw new InvalidDateError(manualDate, `date is after today (${today})`);
    }
  }

  return date === today ? { kind: 'latest' } : { kind: 'date', date };
}
