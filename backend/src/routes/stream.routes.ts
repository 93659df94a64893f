import { Router } from 'express';
import type { StreamController } from '../controllers/stream.controller';

export const createStreamRoutes = (controller: StreamController): Router => {
  const router = Router();

  router.get('/stream', (req, res) => controller.stream(req, res));
  router.post('/toggle_stream', (req, res) => controller.toggleStream(req, res));
  router.post('/camera/start', (req, res) => controller.startCameras(req, res));
  router.post('/camera/stop', (req, res) => controller.stopCameras(req, res));

  return router;
};
