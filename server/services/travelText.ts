/**
 * Small parsers for free-text travel requests, in English and Indonesian.
 */

import { z } from 'zod';
import { readDataFile } from './dataFiles';

export type DayType = 'weekdays' | 'weekends';

const WEEKDAY_NAMES = new Set(['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'senin', 'selasa', 'rabu', 'kamis', 'jumat']);
const WEEKEND_NAMES = new Set(['saturday', 'sunday', 'sabtu', 'minggu']);

const MONTHS: Record<string, number> = {
  jan: 1, january: 1, januari: 1,
  feb: 2, february: 2, februari: 2,
  mar: 3, march: 3, maret: 3,
  apr: 4, april: 4,
  may: 5, mei: 5,
  jun: 6, june: 6, juni: 6,
  jul: 7, july: 7, juli: 7,
  aug: 8, august: 8, agu: 8, agustus: 8,
  sep: 9, sept: 9, september: 9,
  oct: 10, october: 10, okt: 10, oktober: 10,
  nov: 11, november: 11, nop: 11, nopember: 11,
  dec: 12, december: 12, des: 12, desember: 12,
};

function isoDate(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date.toISOString().slice(0, 10);
}

/**
 * Normalize a date to YYYY-MM-DD. Accepts ISO dates, day-first numeric
 * dates ("05-12-2025", "5/12/2025") and "5 Dec 2025" / "5 Desember 2025".
 */
export function parseTravelDate(input: string): string | null {
  const text = input.trim().toLowerCase();

  let m = text.match(/^(\d{4})-(\d{1,2})-(\d{1,2})$/);
  if (m) return isoDate(Number(m[1]), Number(m[2]), Number(m[3]));

  m = text.match(/^(\d{1,2})[-/.](\d{1,2})[-/.](\d{4})$/);
  if (m) return isoDate(Number(m[3]), Number(m[2]), Number(m[1]));

  m = text.match(/^(\d{1,2})\s+([a-z]+)\.?\s+(\d{4})$/);
  if (m) {
    const month = MONTHS[m[2]];
    return month ? isoDate(Number(m[3]), month, Number(m[1])) : null;
  }
  return null;
}

/** 'weekdays' or 'weekends' from a day name or a date; null when unrecognized. */
export function mapToDayType(input: string | null | undefined): DayType | null {
  if (!input) return null;
  const text = input.trim().toLowerCase();

  if (WEEKDAY_NAMES.has(text)) return 'weekdays';
  if (WEEKEND_NAMES.has(text)) return 'weekends';

  const date = parseTravelDate(text);
  if (!date) return null;
  const day = new Date(`${date}T00:00:00Z`).getUTCDay();
  return day === 0 || day === 6 ? 'weekends' : 'weekdays';
}

let landmarkTable: Array<[string, string]> | null = null;

function landmarks(): Array<[string, string]> {
  if (!landmarkTable) {
    landmarkTable = Object.entries(readDataFile('landmarks.json', z.record(z.string())));
  }
  return landmarkTable;
}

/** City (lowercase) of the first known landmark mentioned in the text. */
export function mapLandmarkToCity(text: string | null | undefined): string | null {
  if (!text) return null;
  const lowered = text.toLowerCase();
  for (const [landmark, city] of landmarks()) {
    if (lowered.includes(landmark)) return city;
  }
  return null;
}

export interface GuestsAndNights {
  guests: number;
  nights: number;
}

const GUESTS_PATTERN = /(\d+)\s*(?:orang|guests?|people|persons?|adults?)\b/;
const NIGHTS_PATTERN = /(\d+)\s*(?:malam|nights?)\b/;

/** "3 orang 2 malam" → {guests: 3, nights: 2}. Missing counts default to 1. */
export function extractGuestsAndNights(text: string | null | undefined): GuestsAndNights {
  const lowered = (text ?? '').toLowerCase();
  const guests = lowered.match(GUESTS_PATTERN);
  const nights = lowered.match(NIGHTS_PATTERN);
  return {
    guests: guests ? Number(guests[1]) : 1,
    nights: nights ? Number(nights[1]) : 1,
  };
}
