import { Router } from 'express';
import { createFetchHandler } from '../controller/fetch';
import { createDownloadHandler } from '../controller/download';
import type { MediaService } from '../services/mediaService';

export function createApiRouter(service: MediaService): Router {
    const router = Router();

    router.post('/fetch', createFetchHandler(service));
    router.post('/download', createDownloadHandler(service));

    return router;
}
