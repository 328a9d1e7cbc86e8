import type { Server } from 'node:http';
import type { AppConfig } from './modules/config/index.js';
import { createApp } from './modules/api/index.js';
import { JobScheduler } from './modules/scheduler/index.js';
import { createContainer } from './app.js';

/**
 * Daemon entry point
 *
 * Starts the cron scheduler and the Express status API, and shuts both
 * down gracefully on SIGTERM/SIGINT.
 */
export async function startServer(config: AppConfig): Promise<Server> {
  console.log('Starting rotapost daemon...');

  const container = createContainer(config);

  const isHealthy = await container.checkHealth();
  if (!isHealthy) {
    await container.close();
    throw new Error('Database health check failed');
  }
  console.log('Database connection verified');

  const scheduler = new JobScheduler(container.coordinator, {
    cronExpression: config.daemon.cronExpression,
    timezone: config.daemon.timezone,
    enabled: config.daemon.schedulerEnabled,
  });
  scheduler.start();

  const app = createApp(
    {
      checkHealth: container.checkHealth,
      scheduler,
      credentials: container.credentials,
      store: container.store,
    },
    {
      enableCors: true,
      enableLogging: config.daemon.requestLogging,
      exposeErrorDetails: config.daemon.exposeErrorDetails,
    }
  );

  const port = config.daemon.port;
  const server = app.listen(port, () => {
    console.log(`rotapost running on http://localhost:${port}`);
    console.log('\nAPI Endpoints:');
    console.log('  GET    /health          - Store health');
    console.log('  GET    /api/status      - Scheduler, credentials, latest attempts');
    console.log('  GET    /api/attempts    - Posting log');
    console.log('  POST   /api/runs        - Start a run');

    const state = scheduler.getState();
    console.log('\nScheduler:');
    console.log(`  Status: ${state.isRunning ? 'Running' : 'Stopped'}`);
    console.log(`  Schedule: ${config.daemon.cronExpression} (${config.daemon.timezone})`);
    console.log(`  Next run: ${state.nextRunTime?.toISOString() ?? 'Not scheduled'}`);
  });

  // Graceful shutdown handling
  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}. Shutting down gracefully...`);

    scheduler.stop();

    server.close(() => {
      console.log('HTTP server closed.');
      container
        .close()
        .then(() => {
          console.log('Database connection closed.');
          process.exit(0);
        })
        .catch((error: unknown) => {
          console.error('Error during shutdown:', error);
          process.exit(1);
        });
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  return server;
}
