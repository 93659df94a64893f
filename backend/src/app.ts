import express, { type Application, type Request, type Response } from 'express';
import cors from 'cors';
import * as fs from 'fs';
import * as path from 'path';
import { createRoutes } from './routes';
import type { SessionService } from './services/session.service';

export interface AppOptions {
  session: SessionService;
  frameIntervalMs: number;
  frontendDist?: string;
}

export const createApp = ({ session, frameIntervalMs, frontendDist }: AppOptions): Application => {
  const app: Application = express();

  // Middleware
  app.use(cors({
    origin: '*',
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.get('/health', (req: Request, res: Response) => {
    res.status(200).json({ status: 'OK', timestamp: new Date().toISOString() });
  });

  app.use('/', createRoutes({ session, frameIntervalMs }));

  // Built control page, when present
  if (frontendDist) {
    const distPath = path.resolve(process.cwd(), frontendDist);
    if (fs.existsSync(distPath)) {
      app.use(express.static(distPath));
    } else {
      console.warn(`⚠️ FRONTEND_DIST not found: ${distPath}`);
    }
  }

  return app;
};
