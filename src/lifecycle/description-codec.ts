import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat';
import { DecodeResult } from './types';

dayjs.extend(customParseFormat);

export const INACTIVE_MARKER = 'INACTIVE';

/** Format written into descriptions when an account is disabled */
export const DESCRIPTION_DATE_FORMAT = 'MM/DD/YYYY';

// Older descriptions were written without zero padding
const ACCEPTED_DATE_FORMATS = ['MM/DD/YYYY', 'M/D/YYYY', 'YYYY-MM-DD'];

const MARKER_PREFIX = new RegExp(`^\\s*${INACTIVE_MARKER}(?=\\s|$)`, 'i');

/**
 * Prefix a description with the inactive-since marker and the disable date.
 * The prior description is kept after the date.
 */
export function encodeDisabledDescription(priorDescription: string, disableDate: Date): string {
  const stamp = `${INACTIVE_MARKER} ${dayjs(disableDate).format(DESCRIPTION_DATE_FORMAT)}`;
  const prior = priorDescription.trim();
  return prior ? `${stamp} ${prior}` : stamp;
}

/**
 * Read back the date written by {@link encodeDisabledDescription}.
 * Returns `{ ok: false }` when the marker is missing or the date token is malformed.
 */
export function decodeInactiveDate(description: string | null | undefined): DecodeResult {
  if (!description || !MARKER_PREFIX.test(description)) {
    return { ok: false };
  }

  const [token] = description.replace(MARKER_PREFIX, '').trim().split(/\s+/);
  if (!token) {
    return { ok: false };
  }

  const parsed = dayjs(token, ACCEPTED_DATE_FORMATS, true);
  if (!parsed.isValid()) {
    return { ok: false };
  }

  return { ok: true, date: parsed.toDate() };
}
