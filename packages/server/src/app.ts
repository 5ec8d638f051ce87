import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import http from 'http';
import {
  ContentDirectoryService,
  createContentDirectoryState,
  createModuleLogger,
  InMemoryLibrary,
  SystemUpdateNotifier,
} from 'cds-core';
import { config, type AppConfig } from './config';
import { createRouter } from './routes';
import { createAxiosTransport, EventSubscriptionManager, type NotifyTransport } from './eventSubscriptions';

const logger = createModuleLogger('AppServer');

export interface MediaServerSettings {
  friendlyName: string;
  baseUrl: string;
  browseAgeLimit: number;
  libraryFile: string;
  defaultSubscriptionTimeoutSec: number;
}

export interface MediaServer {
  app: Express;
  library: InMemoryLibrary;
  service: ContentDirectoryService;
  notifier: SystemUpdateNotifier;
  subscriptions: EventSubscriptionManager;
}

/**
 * @hebrew מרכיב את השירות, המנויים והנתיבים לאפליקציית express אחת.
 * @param transport - ערוץ שליחת ה-NOTIFY (ברירת המחדל: axios).
 */
export function createMediaServer(
  library: InMemoryLibrary,
  settings: MediaServerSettings,
  transport: NotifyTransport = createAxiosTransport(config.events.notifyTimeoutMs),
): MediaServer {
  const subscriptions = new EventSubscriptionManager({
    defaultTimeoutSec: settings.defaultSubscriptionTimeoutSec,
    transport,
  });
  const notifier = new SystemUpdateNotifier(createContentDirectoryState(library.lastScanTime()), subscriptions);
  const service = new ContentDirectoryService(library, notifier, {
    baseUrl: settings.baseUrl,
    friendlyName: settings.friendlyName,
    browseAgeLimit: settings.browseAgeLimit,
  });

  library.on('rescan', (scanTime: number) => notifier.rescanCompleted(scanTime));
  subscriptions.on('expired', () => notifier.unsubscribe());

  const app = express();
  app.use(express.json());
  app.use(createRouter({ service, notifier, library, subscriptions, libraryFile: settings.libraryFile }));

  // Error handling middleware - חייב להיות האחרון
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    logger.error('An error occurred in an Express handler:', err);

    const statusCode = 'status' in err && typeof err.status === 'number' ? err.status : 500;

    // בייצור לא חושפים פרטי שגיאות 500
    if (process.env.NODE_ENV === 'production' && statusCode === 500) {
      res.status(500).json({ error: 'Internal Server Error' });
    } else {
      res.status(statusCode).json({ error: err.message || 'Internal Server Error', details: err.stack });
    }
  });

  return { app, library, service, notifier, subscriptions };
}

export interface RunningServer {
  media: MediaServer;
  server: http.Server;
  stop(): Promise<void>;
}

export const settingsFromConfig = (appConfig: AppConfig): MediaServerSettings => ({
  friendlyName: appConfig.mediaServer.friendlyName,
  baseUrl: appConfig.mediaServer.publicUrl || `http://localhost:${appConfig.server.port}`,
  browseAgeLimit: appConfig.library.browseAgeLimit,
  libraryFile: appConfig.library.file,
  defaultSubscriptionTimeoutSec: appConfig.events.defaultTimeoutSec,
});

/**
 * @hebrew טוען את הספרייה ומפעיל את שרת ה-HTTP.
 */
export async function startServer(appConfig: AppConfig = config): Promise<RunningServer> {
  const library = await InMemoryLibrary.fromFile(appConfig.library.file);
  const media = createMediaServer(
    library,
    settingsFromConfig(appConfig),
    createAxiosTransport(appConfig.events.notifyTimeoutMs),
  );
  media.subscriptions.startSweeping(appConfig.events.sweepIntervalMs);

  const server = http.createServer(media.app);
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(appConfig.server.port, appConfig.server.host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  logger.info(`Server listening on ${appConfig.server.host}:${appConfig.server.port}`);
  logger.info(`ContentDirectory control URL: ${settingsFromConfig(appConfig).baseUrl}/upnp/control/ContentDirectory`);

  const stop = () =>
    new Promise<void>((resolve, reject) => {
      media.notifier.cancel();
      media.subscriptions.stopSweeping();
      server.close(error => (error ? reject(error) : resolve()));
    });

  return { media, server, stop };
}
