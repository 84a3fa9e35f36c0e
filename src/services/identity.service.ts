import { LogSink } from '../types';
import { parseLine, splitLines } from '../utils/line-parser';

export type IdentitySource = 'query' | 'body' | 'body-scan' | 'header' | 'fallback';

export interface IdentityRequest {
    query: Record<string, string>;
    body: string;
    headers: Record<string, string | string[] | undefined>;
    ip: string;
}

export interface ResolvedIdentity {
    deviceId: string;
    source: IdentitySource;
    /** Identity facts found in the body, folded into the device's parameters. */
    facts: Record<string, string>;
}

const EMBEDDED_SN = /(?:^|[^A-Za-z0-9~])SN\s*=\s*([^\s&,;]+)/i;

/**
 * Strip the IPv4-mapped prefix Node reports for dual-stack sockets
 */
export function normalizeIp(ip: string): string {
    return ip.trim().replace(/^::ffff:/i, '');
}

export function fallbackDeviceId(ip: string): string {
    const normalized = normalizeIp(ip);
    return `IP-${normalized ? normalized.replace(/[.:]/g, '_') : 'unknown'}`;
}

/**
 * Works out which terminal sent a request. Terminals supply their serial
 * inconsistently, so strategies are tried in order and the source IP is the
 * last resort. An IP-keyed device is never merged into its serial-keyed twin.
 */
export class IdentityService {
    constructor(
        private readonly headerNames: string[],
        private readonly logSink: LogSink
    ) {}

    resolve(request: IdentityRequest): ResolvedIdentity {
        const facts = this.bodyFacts(request.body);

        const fromQuery = this.fromQuery(request.query);
        if (fromQuery) {
            return { deviceId: fromQuery, source: 'query', facts };
        }

        const fromBody = Object.entries(facts)[0];
        if (fromBody) {
            return { deviceId: fromBody[1], source: 'body', facts };
        }

        const scanned = EMBEDDED_SN.exec(request.body);
        if (scanned) {
            return { deviceId: scanned[1], source: 'body-scan', facts };
        }

        const fromHeader = this.fromHeaders(request.headers);
        if (fromHeader) {
            return { deviceId: fromHeader, source: 'header', facts };
        }

        const deviceId = fallbackDeviceId(request.ip);
        this.logSink.append('info', `No serial number supplied by ${request.ip || 'unknown address'}, using ${deviceId}`, deviceId);
        return { deviceId, source: 'fallback', facts };
    }

    private fromQuery(query: Record<string, string>): string | null {
        for (const [key, value] of Object.entries(query)) {
            if (key.toUpperCase() === 'SN' && value.trim()) {
                return value.trim();
            }
        }
        return null;
    }

    private bodyFacts(body: string): Record<string, string> {
        const facts: Record<string, string> = {};
        for (const line of splitLines(body)) {
            const parsed = parseLine(line);
            if (parsed.kind === 'identity' && !(parsed.fact.key in facts)) {
                facts[parsed.fact.key] = parsed.fact.value;
            }
        }
        return facts;
    }

    private fromHeaders(headers: Record<string, string | string[] | undefined>): string | null {
        for (const name of this.headerNames) {
            const raw = headers[name];
            const value = Array.isArray(raw) ? raw[0] : raw;
            if (value && value.trim()) {
                return value.trim();
            }
        }
        return null;
    }
}
