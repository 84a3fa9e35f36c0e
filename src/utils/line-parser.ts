import { AttendanceCandidate, AttendanceStatus, IdentityFact, ParsedLine } from '../types';

export const IDENTITY_KEYS = ['SN', 'SERIALNUMBER', '~SERIALNUMBER', 'DEVICESN'];

const STATUS_LABELS = new Map<string, AttendanceStatus>([
    ['0', 'Check-in'],
    ['1', 'Check-out'],
    ['2', 'Break-out'],
    ['3', 'Break-in'],
    ['4', 'Overtime-in'],
    ['5', 'Overtime-out'],
    ['255', 'Error'],
]);

const ASSIGNMENT = /^\s*([^=\s]+)\s*=\s*(.*?)\s*$/;
const YEAR = /\d{4}/;

/**
 * Map a raw status code to its category. Undocumented codes are "Unknown".
 */
export function statusLabel(code: string): AttendanceStatus {
    const trimmed = code.trim();
    const normalized = /^\d+$/.test(trimmed) ? String(parseInt(trimmed, 10)) : trimmed;
    return STATUS_LABELS.get(normalized) ?? 'Unknown';
}

/**
 * Replace the first run of spaces between date and time with "T".
 * The rest of the device's own format is kept as sent.
 */
export function normalizeTimestamp(value: string): string {
    return value.trim().replace(/^(\S+) +(?=\S)/, '$1T');
}

function looksLikeDateTime(value: string): boolean {
    return value.length >= 10 && YEAR.test(value);
}

function parseIdentity(line: string): IdentityFact | null {
    for (const segment of line.split(/[\t&]/)) {
        const match = ASSIGNMENT.exec(segment);
        if (!match) continue;

        const [, key, value] = match;
        if (IDENTITY_KEYS.includes(key.toUpperCase()) && value.length > 0) {
            return { key, value };
        }
    }
    return null;
}

function parseAttendance(line: string): AttendanceCandidate | null {
    const fields = line.split('\t').map((field) => field.trim());
    if (fields.length < 3) {
        return null;
    }

    const [userId, rawTimestamp, statusCode, verification, workCode] = fields;
    if (!userId || !looksLikeDateTime(rawTimestamp)) {
        return null;
    }

    const candidate: AttendanceCandidate = {
        userId,
        timestamp: normalizeTimestamp(rawTimestamp),
        statusCode,
        status: statusLabel(statusCode),
        rawLine: line,
    };
    if (verification) candidate.verification = verification;
    if (workCode) candidate.workCode = workCode;

    return candidate;
}

/**
 * Classify one protocol line as an attendance event, an identity fact, or neither.
 */
export function parseLine(rawLine: string): ParsedLine {
    const line = rawLine.replace(/^[\r\n ]+|[\r\n ]+$/g, '');

    const fact = parseIdentity(line);
    if (fact) {
        return { kind: 'identity', fact };
    }

    const candidate = parseAttendance(line);
    if (candidate) {
        return { kind: 'attendance', candidate };
    }

    return { kind: 'unrecognized', line };
}

/**
 * Split a request body into non-blank lines.
 */
export function splitLines(body: string): string[] {
    return body.split(/\r?\n/).filter((line) => line.trim().length > 0);
}

/**
 * Collect KEY=VALUE pairs from a command-response body. Pairs may be one per
 * line or joined with "&"; only the first "=" separates key from value.
 */
export function parseKeyValueLines(body: string): Record<string, string> {
    const pairs: Record<string, string> = {};

    for (const line of splitLines(body)) {
        for (const part of line.split('&')) {
            const index = part.indexOf('=');
            if (index <= 0) continue;

            const key = part.slice(0, index).trim();
            if (key) {
                pairs[key] = part.slice(index + 1).trim();
            }
        }
    }

    return pairs;
}
