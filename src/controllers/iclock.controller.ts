import { Request, Response } from 'express';
import { IclockService, ProtocolRequest } from '../services/iclock.service';

type ProtocolHandler = (request: ProtocolRequest) => Promise<string>;

/**
 * Keep only scalar query values; terminals never send nested parameters
 */
function flattenQuery(query: Request['query']): Record<string, string> {
    const flat: Record<string, string> = {};
    for (const [key, value] of Object.entries(query)) {
        const first: unknown = Array.isArray(value) ? value[0] : value;
        if (typeof first === 'string') {
            flat[key] = first;
        }
    }
    return flat;
}

export function toProtocolRequest(req: Request): ProtocolRequest {
    return {
        method: req.method,
        path: req.path,
        query: flattenQuery(req.query),
        body: typeof req.body === 'string' ? req.body : '',
        headers: req.headers,
        ip: req.ip ?? req.socket.remoteAddress ?? '',
    };
}

function reply(handler: ProtocolHandler) {
    return async (req: Request, res: Response): Promise<void> => {
        const text = await handler(toProtocolRequest(req));
        res.type('text/plain').send(text);
    };
}

/**
 * Express handlers for the terminal-facing paths
 */
export function createIclockController(iclock: IclockService) {
    return {
        cdata: reply((request) => iclock.handlePush(request)),
        getRequest: reply((request) => iclock.handlePoll(request)),
        registry: reply((request) => iclock.handleRegistration(request)),
        deviceCmd: reply((request) => iclock.handleCommandResponse(request)),
    };
}
