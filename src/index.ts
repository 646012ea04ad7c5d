import { appConfig } from './config';
import { createApp } from './app';
import { createServices } from './lib/services';

const HOUR_MS = 60 * 60 * 1000;
const JOB_PRUNE_INTERVAL_MS = 15 * 60 * 1000;

const start = async () => {
  const services = await createServices(appConfig).catch((error: unknown) => {
    // eslint-disable-next-line no-console
    console.error('[startup] Failed to initialize services:', error);
    return process.exit(1);
  });

  if (appConfig.sessions.pruneOnStartup) {
    try {
      await services.sessions.pruneStale(appConfig.sessions.staleAfterDays);
    } catch (error) {
      // eslint-disable-next-line no-console
      console.error('[startup] Failed to prune stale sessions:', error);
    }
  }

  const { pipeline, sessions } = services;
  const retentionMs = appConfig.generation.jobRetentionHours * HOUR_MS;
  const pruneTimer = setInterval(() => {
    const removed = pipeline.pruneJobs(retentionMs);
    if (removed > 0) {
      // eslint-disable-next-line no-console
      console.info(`[queue] Pruned ${removed} finished job(s).`);
    }
  }, JOB_PRUNE_INTERVAL_MS);
  pruneTimer.unref();

  const app = createApp(services);
  const server = app.listen(appConfig.port, appConfig.host, () => {
    // eslint-disable-next-line no-console
    console.log(
      `dream-dispatch running at http://${appConfig.host}:${appConfig.port} (image service: ${appConfig.generation.serviceUrl})`,
    );
  });

  const gracefulShutdown = () => {
    clearInterval(pruneTimer);
    server.close(() => {
      sessions
        .flush()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          // eslint-disable-next-line no-console
          console.error('[shutdown] Failed to flush sessions:', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', gracefulShutdown);
  process.on('SIGINT', gracefulShutdown);
};

void start();
