import 'dotenv/config';
import log from './log';
import { createApp } from './app';
import { loadConfig } from './config';
import { findYtDlpBinary, YtDlpEngine } from './lib/ytDlp';
import { FsArtifactStore } from './services/artifactStore';
import { MediaService } from './services/mediaService';

async function main(): Promise<void> {
    const config = loadConfig();

    const store = new FsArtifactStore(config.downloadDir);
    await store.ensureDirectory();

    const binary = await findYtDlpBinary(config.ytDlpBinary);
    log.info(`Using yt-dlp binary: ${binary}`);

    const engine = new YtDlpEngine({
        binary,
        cookiesPath: config.cookiesPath,
        ffmpegPath: config.ffmpegPath,
        userAgent: config.userAgent,
        audioFormat: config.audioFormat,
        videoMergeFormat: config.videoMergeFormat,
    });
    const service = new MediaService(engine, store, config);
    const app = createApp(config, service);

    app.listen(config.port, () => {
        log.info(`Server is running on port ${config.port}; files in ${config.downloadDir}`);
    });
}

main().catch((error: unknown) => {
    log.fatal('Failed to start server', error);
    process.exit(1);
});
