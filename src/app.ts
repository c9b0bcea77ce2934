/**
 * Express application for the menu planner API
 * Built from injected collaborators so tests can swap the classifier
 */

import express from 'express';
import cors from 'cors';
import { config } from './config.js';
import { createMenuRouter } from './routes/menus.js';
import { createPlanRouter } from './routes/plans.js';
import settingsRoutes from './routes/settings.js';
import type { RouteDeps } from './routes/deps.js';

export interface AppOptions extends RouteDeps {
  classifierConfigured: boolean;
}

export function createApp(options: AppOptions): express.Express {
  const { store, classifier, classifierConfigured } = options;
  const app = express();

  // Middleware
  app.use(cors({
    origin: config.allowedOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization']
  }));
  app.use(express.json());

  // API Routes
  app.use('/api/menus', createMenuRouter({ store, classifier }));
  app.use('/api/plans', createPlanRouter({ store, classifier }));
  app.use('/api/settings', settingsRoutes);

  // Health check
  app.get('/api/health', (req, res) => {
    res.json({ status: 'ok', classifier: classifierConfigured });
  });

  return app;
}
