import type { Request, Response } from 'express';
import type { MediaService } from '../services/mediaService';
import type { DownloadRequest, MediaKind } from '../services/types';
import { InvalidRequestError } from '../services/errors';
import { sendError } from './errorResponse';

function readField(body: Record<string, unknown>, ...names: string[]): string {
    for (const name of names) {
        const value = body[name];
        if (typeof value === 'string' && value.trim()) {
            return value.trim();
        }
    }
    return '';
}

function parseKind(value: string): MediaKind {
    if (value === 'video' || value === 'audio') {
        return value;
    }
    throw new InvalidRequestError('kind must be "video" or "audio".');
}

/** Accepts `selector`/`kind` as well as the older `format_id`/`format_type` field names. */
export function parseDownloadRequest(body: unknown): DownloadRequest {
    if (!body || typeof body !== 'object' || Array.isArray(body)) {
        throw new InvalidRequestError('Request body must be a JSON object.');
    }
    const fields = Object.fromEntries(Object.entries(body));

    const url = readField(fields, 'url');
    const selector = readField(fields, 'selector', 'format_id');
    if (!url) {
        throw new InvalidRequestError('URL is required.');
    }
    if (!selector) {
        throw new InvalidRequestError('A format selector is required.');
    }

    const kind = parseKind(readField(fields, 'kind', 'format_type'));
    const qualityLabel = readField(fields, 'quality_label', 'qualityLabel') || kind;

    return { url, selector, kind, qualityLabel };
}

export function createDownloadHandler(service: MediaService) {
    return async (req: Request, res: Response): Promise<Response> => {
        try {
            const request = parseDownloadRequest(req.body);
            const result = await service.download(request);
            return res.json(result);
        } catch (error) {
            return sendError(res, error, 'download');
        }
    };
}
