import type { Request, Response } from 'express';
import log from '../log';
import type { MediaService } from '../services/mediaService';
import { sendError } from './errorResponse';

export function createFileHandler(service: MediaService) {
    return async (req: Request, res: Response): Promise<void> => {
        const name = typeof req.params.name === 'string' ? req.params.name : '';

        let filePath: string;
        try {
            filePath = await service.resolveArtifactPath(name);
        } catch (error) {
            sendError(res, error, `serve ${JSON.stringify(name)}`);
            return;
        }

        res.setHeader('Cache-Control', 'no-store');
        res.setHeader('X-Content-Type-Options', 'nosniff');
        res.download(filePath, name, (err) => {
            if (!err) return;
            log.error(`Failed to send ${name}`, err);
            if (!res.headersSent) {
                res.status(500).json({ error: 'Failed to send file.' });
            }
        });
    };
}
