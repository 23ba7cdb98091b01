import express, { type Request, type Response } from 'express';

import { loadSettings, type AppSettings } from './config/settings';
import { describeError } from './errors/batchErrors';
import { createBatchRouter } from './routes/batch';
import { createFilesRouter } from './routes/files';
import { createFormatsRouter } from './routes/formats';
import { createOutputDirectoryRouter } from './routes/outputDirectory';
import { BatchOrchestrator } from './services/batchOrchestrator';
import { FfmpegMediaService, type MediaService } from './services/mediaService';

export interface AppContext {
  app: express.Express;
  orchestrator: BatchOrchestrator;
  mediaService: MediaService;
  settings: AppSettings;
}

export interface CreateAppOptions {
  settings?: AppSettings;
  mediaService?: MediaService;
}

export async function createApp(options: CreateAppOptions = {}): Promise<AppContext> {
  const settings = options.settings ?? loadSettings();
  const mediaService = options.mediaService ?? new FfmpegMediaService({
    ffmpegPath: settings.ffmpegPath,
    ffprobePath: settings.ffprobePath,
    audioBitrate: settings.audioBitrate
  });
  const orchestrator = new BatchOrchestrator(mediaService, {
    inputExtensions: settings.inputExtensions
  });

  console.log(`Using media tool executable at: ${mediaService.getExecutablePath()}`);
  console.log(`Accepting input extensions: ${settings.inputExtensions.join(', ')}`);

  if (settings.outputDirectory) {
    try {
      await orchestrator.setOutputDirectory(settings.outputDirectory);
      console.log(`Using output directory: ${settings.outputDirectory}`);
    } catch (error) {
      console.warn(`Ignoring OUTPUT_DIR: ${describeError(error)}`);
    }
  }

  const app = express();
  app.use(express.json());

  app.use('/files', createFilesRouter(orchestrator));
  app.use('/output-directory', createOutputDirectoryRouter(orchestrator));
  app.use('/batch', createBatchRouter(orchestrator));
  app.use('/formats', createFormatsRouter(settings.inputExtensions));

  app.get('/health', async (_req: Request, res: Response) => {
    const available = await mediaService.isAvailable();
    res.json({ status: 'ok', mediaTool: available ? 'up' : 'down' });
  });

  return { app, orchestrator, mediaService, settings };
}
