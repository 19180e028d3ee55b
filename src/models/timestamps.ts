const ISO_PATTERN =
    /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:?\d{2})?$/;

export function formatTimestamp(date: Date): string {
    return date.toISOString();
}

/**
 * Parses an ISO-8601 timestamp as written by `formatTimestamp` or by the
 * older console releases (microsecond fraction, no zone). Zone-less values are UTC.
 * Fractions finer than a millisecond are truncated. Out-of-range fields
 * (month 13, minute 60) are rejected, not rolled over.
 * @returns The parsed date, or `undefined` when the text is not a timestamp.
 */
export function parseTimestamp(text: string): Date | undefined {
    const match = ISO_PATTERN.exec(text.trim());
    if (!match) {
        return undefined;
    }
    const [, year, month, day, hour, minute, second, fraction, zone] = match;
    const fields = [year, month, day, hour, minute, second].map(Number);
    const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0;
    const wallClock = new Date(Date.UTC(fields[0], fields[1] - 1, fields[2], fields[3], fields[4], fields[5], millis));
    // Date.UTC rolls out-of-range fields over (month 13, hour 99); reading them back catches that
    const readBack = [
        wallClock.getUTCFullYear(),
        wallClock.getUTCMonth() + 1,
        wallClock.getUTCDate(),
        wallClock.getUTCHours(),
        wallClock.getUTCMinutes(),
        wallClock.getUTCSeconds(),
    ];
    if (readBack.some((value, i) => value !== fields[i])) {
        return undefined;
    }
    let epoch = wallClock.getTime();
    if (zone && zone !== 'Z') {
        const sign = zone.startsWith('-') ? -1 : 1;
        const digits = zone.slice(1).replace(':', '');
        const offsetHours = Number(digits.slice(0, 2));
        const offsetMinutes = Number(digits.slice(2));
        if (offsetHours > 23 || offsetMinutes > 59) {
            return undefined;
        }
        epoch -= sign * (offsetHours * 60 + offsetMinutes) * 60_000;
    }
    return new Date(epoch);
}
