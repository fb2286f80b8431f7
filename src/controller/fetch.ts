import type { Request, Response } from 'express';
import log from '../log';
import type { MediaService } from '../services/mediaService';
import { sendError } from './errorResponse';

export function createFetchHandler(service: MediaService) {
    return async (req: Request, res: Response): Promise<Response> => {
        const url = typeof req.body?.url === 'string' ? req.body.url.trim() : '';
        if (!url) {
            return res.status(400).json({ error: 'URL is required.' });
        }

        log.info(`Fetching formats for ${url}`);
        try {
            const summary = await service.fetchMedia(url);
            return res.json(summary);
        } catch (error) {
            return sendError(res, error, `fetch ${url}`);
        }
    };
}
