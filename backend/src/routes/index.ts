import { Router } from 'express';
import { SessionController } from '../controllers/session.controller';
import { StreamController } from '../controllers/stream.controller';
import type { SessionService } from '../services/session.service';
import { createSessionRoutes } from './session.routes';
import { createStreamRoutes } from './stream.routes';

export interface RouteDependencies {
  session: SessionService;
  frameIntervalMs: number;
}

export const createRoutes = ({ session, frameIntervalMs }: RouteDependencies): Router => {
  const router = Router();

  router.use('/', createSessionRoutes(new SessionController(session)));
  router.use('/', createStreamRoutes(new StreamController(session, frameIntervalMs)));

  return router;
};
