import { mkdir } from 'fs/promises';
import { buildApp } from './app';
import { config } from './config/env';
import { initSentry } from './config/sentry';
import { initCronJobs, runArtifactSweep } from './jobs/cron';
import { reportProcessingService } from './services/ReportProcessingService';

// Initialize Sentry before anything else
initSentry();

const start = async () => {
  const app = buildApp();

  let isShuttingDown = false;
  let cronHandle: { stop: () => void } | null = null;

  const handleShutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    app.log.info(`Received ${signal}, starting graceful shutdown...`);

    const timeout = setTimeout(() => {
      app.log.error('Force shutdown due to timeout');
      process.exit(1);
    }, 10000);

    try {
      // Stop cron schedules first to prevent new work starting mid-shutdown
      cronHandle?.stop();

      await app.close();
      // Let in-flight report runs record their outcome and remove their inputs
      await reportProcessingService.waitForIdle();
      clearTimeout(timeout);
      app.log.info('Graceful shutdown complete');
      process.exit(0);
    } catch (err) {
      app.log.error(err, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void handleShutdown('SIGINT'));
  process.on('SIGTERM', () => void handleShutdown('SIGTERM'));

  try {
    await mkdir(config.REPORTS_TEMP_DIR, { recursive: true });

    // Leftovers from a previous process are swept before accepting uploads
    await runArtifactSweep();

    if (config.CRON_ENABLED === 'true') {
      app.log.info('CRON_ENABLED=true');
      cronHandle = initCronJobs();
    } else {
      app.log.info('CRON_ENABLED=false');
    }

    await app.listen({ port: config.PORT, host: config.HOST });
    console.log(`Server listening on port ${config.PORT}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

void start();
