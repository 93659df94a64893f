import { Router } from 'express';
import type { SessionController } from '../controllers/session.controller';

export const createSessionRoutes = (controller: SessionController): Router => {
  const router = Router();

  router.get('/status', (req, res) => controller.getStatus(req, res));
  router.post('/toggle', (req, res) => controller.toggleCamera(req, res));
  router.post('/select', (req, res) => controller.selectCamera(req, res));
  router.post('/record/start', (req, res) => controller.startRecording(req, res));
  router.post('/record/stop', (req, res) => controller.stopRecording(req, res));

  return router;
};
