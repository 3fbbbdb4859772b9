import path from 'path';
import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { getRouteEntries } from './utils/routesRegistry';
import './api';

export const initServer = (app: Express) => {
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ['\'self\''],
        scriptSrc: ['\'self\'', '\'unsafe-inline\''],
        styleSrc: ['\'self\'', '\'unsafe-inline\''],
        imgSrc: ['\'self\'', 'data:', 'https:'],
        connectSrc: ['\'self\'', 'ws:', 'wss:'],
        objectSrc: ['\'none\''],
        frameSrc: ['\'none\''],
      },
    },
  }));
  // The widget is embedded on other sites, so the API answers any origin.
  app.use(cors({ origin: true }));
  app.use(express.json({ limit: '1mb' }));
  app.use((_, res, next) => {
    res.header('Cross-Origin-Resource-Policy', 'cross-origin');
    next();
  });

  app.use('/', express.static(path.join(__dirname, 'static')));

  for (const route of getRouteEntries()) {
    app[route.method](route.path, route.handler);
  }

  app.use(notFoundHandler);
  app.use(errorHandler);
};
