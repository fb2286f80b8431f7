import type { Response } from 'express';
import log from '../log';
import { MediaServiceError } from '../services/errors';

export function sendError(res: Response, error: unknown, context: string): Response {
    if (error instanceof MediaServiceError) {
        if (error.statusCode >= 500) {
            log.error(`${context} failed: ${error.message}`, error.detail ?? '');
        } else {
            log.warn(`${context} rejected (${error.statusCode}): ${error.message}`);
        }
        const body: { error: string; detail?: string } = { error: error.message };
        if (error.detail && error.statusCode < 500) {
            body.detail = error.detail;
        }
        return res.status(error.statusCode).json(body);
    }

    log.error(`${context} failed unexpectedly`, error);
    return res.status(500).json({ error: 'Internal server error' });
}
