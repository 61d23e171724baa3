export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export function toEpochSeconds(millis: number): number {
    return Math.floor(millis / 1000);
}

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/**
 * Formats as `YYYY-MM-DD HH:mm:ss` in UTC, the zone Lambda runs in.
 */
export function formatTimestamp(millis: number): string {
    const d = new Date(millis);
    const date = `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
    const time = `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`;
    return `${date} ${time}`;
}
