import e, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import log from './log';
import type { AppConfig } from './config';
import { createApiRouter } from './routes/apiRoutes';
import { createFileRouter } from './routes/fileRoutes';
import { FILES_ROUTE, type MediaService } from './services/mediaService';

export function createApp(config: Pick<AppConfig, 'corsOrigins'>, service: MediaService): e.Express {
    const app = e();

    const allowAll = config.corsOrigins.includes('*');
    app.use(cors({
        origin: allowAll ? true : config.corsOrigins,
        methods: ['GET', 'HEAD', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type'],
        credentials: !allowAll,
    }));
    app.use(e.json({ limit: '100kb' }));

    // HEAD is answered by the GET route.
    app.get('/', (_req, res) => {
        res.json({ status: 'running' });
    });

    const apiRouter = createApiRouter(service);
    app.use('/api', apiRouter);
    app.use('/', apiRouter);
    app.use(FILES_ROUTE, createFileRouter(service));

    app.use((_req, res) => {
        res.status(404).json({ error: 'Not found' });
    });

    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        if (isBodyParseError(err)) {
            res.status(400).json({ error: 'Malformed JSON body.' });
            return;
        }
        log.error('Unhandled request error', err);
        if (!res.headersSent) {
            res.status(500).json({ error: 'Internal server error' });
        }
    });

    return app;
}

function isBodyParseError(err: unknown): boolean {
    return typeof err === 'object'
        && err !== null
        && 'type' in err
        && err.type === 'entity.parse.failed';
}
