import { TZDate } from '@date-fns/tz';
import { format } from 'date-fns';

export const REPORT_DATE_FORMAT = 'yyyy-MM-dd';
export const REPORT_TIME_FORMAT = 'HH:mm';

/**
 * Whether the name is an IANA timezone the runtime knows about
 */
export function isValidTimezone(timezone: string): boolean {
    try {
        return !Number.isNaN(new TZDate(0, timezone).getTime());
    } catch {
        return false;
    }
}

/**
 * Formats a date as seen on the wall clock of an IANA timezone.
 * Without a timezone, the local clock of the process is used.
 */
export function formatInTimezone(date: Date, pattern: string, timezone?: string): string {
    if (!timezone) {
        return format(date, pattern);
    }

    return format(new TZDate(date.getTime(), timezone), pattern);
}
