import { Router } from 'express';
import { createFileHandler } from '../controller/files';
import type { MediaService } from '../services/mediaService';

export function createFileRouter(service: MediaService): Router {
    const router = Router();

    router.get('/:name', createFileHandler(service));

    return router;
}
