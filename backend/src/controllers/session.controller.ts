import type { Request, Response } from 'express';
import type { SessionService } from '../services/session.service';
import type { ActiveCameraResponse, RecordingResponse } from '../types/api.types';
import { sendError } from './errorResponse';

export class SessionController {
  constructor(private readonly session: SessionService) {}

  getStatus(req: Request, res: Response): void {
    res.status(200).json(this.session.snapshot());
  }

  async selectCamera(req: Request, res: Response): Promise<void> {
    try {
      const label: unknown = req.body?.label;

      if (typeof label !== 'string' || !label) {
        res.status(400).json({
          error: 'INVALID_REQUEST',
          message: 'label is required',
        });
        return;
      }

      const active = await this.session.selectCamera(label);
      const body: ActiveCameraResponse = { active };
      res.status(200).json(body);
    } catch (error) {
      sendError(res, error, 'Failed to select camera');
    }
  }

  async toggleCamera(req: Request, res: Response): Promise<void> {
    try {
      const active = await this.session.toggleCamera();
      const body: ActiveCameraResponse = { active };
      res.status(200).json(body);
    } catch (error) {
      sendError(res, error, 'Failed to toggle camera');
    }
  }

  async startRecording(req: Request, res: Response): Promise<void> {
    try {
      const file = await this.session.startRecording();
      const body: RecordingResponse = { status: 'recording', file };
      res.status(200).json(body);
    } catch (error) {
      sendError(res, error, 'Failed to start recording');
    }
  }

  async stopRecording(req: Request, res: Response): Promise<void> {
    try {
      const file = await this.session.stopRecording();
      const body: RecordingResponse = { status: 'stopped', file };
      res.status(200).json(body);
    } catch (error) {
      sendError(res, error, 'Failed to stop recording');
    }
  }
}
