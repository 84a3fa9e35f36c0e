const DIVISORS_OF_60 = [1, 2, 3, 4, 5, 6, 10, 12, 15, 20, 30];

function evenStep(value: number): number {
    return DIVISORS_OF_60.filter((divisor) => divisor <= value).pop() ?? 1;
}

/**
 * Build a node-cron expression (seconds field included) firing every N seconds.
 *
 * Cron steps restart at every minute (or hour), so an interval is rounded down
 * to the nearest step that divides 60: 45 s runs every 30 s, 90 s every minute,
 * 7 min every 6 min. An hour or more runs hourly.
 */
export function everySeconds(seconds: number): string {
    if (!Number.isFinite(seconds) || seconds < 1) {
        throw new Error(`Schedule interval must be at least 1 second, got ${seconds}`);
    }
    if (seconds < 60) {
        return `*/${evenStep(Math.floor(seconds))} * * * * *`;
    }

    const minutes = Math.floor(seconds / 60);
    if (minutes >= 60) {
        return '0 0 * * * *';
    }
    return `0 */${evenStep(minutes)} * * * *`;
}
