import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import customParseFormat from 'dayjs/plugin/customParseFormat';

export const ISO_DATE_FORMAT = 'YYYY-MM-DD';
export const TIME_OF_DAY_FORMAT = 'HH:mm';

dayjs.extend(utc);
dayjs.extend(customParseFormat);

/**
 * Parses a `YYYY-MM-DD` calendar date as a UTC midnight so that day arithmetic never crosses a
 * daylight-saving transition. Returns an invalid instance for anything else.
 */
export function parseISODate(value: string): dayjs.Dayjs {
  return dayjs.utc(value, ISO_DATE_FORMAT, true);
}

export function formatISODate(value: dayjs.Dayjs): string {
  return value.format(ISO_DATE_FORMAT);
}

export function nowISO(): string {
  return dayjs.utc().toISOString();
}

export default dayjs;
