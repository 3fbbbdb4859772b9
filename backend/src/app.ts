import express from 'express';
import type { Server } from 'node:http';
import { config, getServices } from './core';
import { attachEscalationHub } from './lib/escalation/attachEscalationHub';
import { initServer } from './server';
import { logger } from './utils/logger';
import { describeRoutes } from './utils/routesRegistry';

const hasErrorCode = (error: unknown, code: string) =>
  error instanceof Error && 'code' in error && error.code === code;

const bootstrap = async () => {
  const app = express();
  initServer(app);

  const httpServer = await new Promise<Server>((resolve, reject) => {
    const server: Server = app.listen(config.port, (error) => {
      if (error) {
        if (hasErrorCode(error, 'EADDRINUSE')) {
          logger.error(`Port ${config.port} is already in use. Stop the other process or change PORT, then restart.`);
        }
        reject(error);
        return;
      }
      resolve(server);
    });
  });

  const services = getServices();
  const liveChat = attachEscalationHub(httpServer, services.escalationHub);

  logger.info(`🚀 Campus support chat running on port ${config.port}`);
  logger.debug('Routes', describeRoutes());
  logger.info(`LLM providers: ${services.llm.configuredProviderNames().join(', ') || 'none'}`);

  // Graceful shutdown
  let isShuttingDown = false;
  const shutdown = async (signal: 'SIGINT' | 'SIGTERM') => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info(`Shutting down gracefully... (${signal})`);

    await liveChat.close();

    // Stop accepting new connections, but never hang forever on open streams.
    const closeTimeoutMs = 5_000;
    await Promise.race([
      new Promise<void>((res) => httpServer.close(() => res())),
      new Promise<void>((res) => setTimeout(res, closeTimeoutMs)),
    ]);

    process.exit(0);
  };

  process.on('SIGINT', () => { void shutdown('SIGINT'); });
  process.on('SIGTERM', () => { void shutdown('SIGTERM'); });
};

bootstrap().catch((err) => {
  logger.error('Error starting server:', err);
  process.exit(1);
});
