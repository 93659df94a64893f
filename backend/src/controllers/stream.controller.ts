import type { Request, Response } from 'express';
import type { SessionService } from '../services/session.service';
import { sendError } from './errorResponse';

export const MJPEG_BOUNDARY = 'frame';

export const formatFramePart = (frame: Buffer): Buffer =>
  Buffer.concat([
    Buffer.from(`--${MJPEG_BOUNDARY}\r\nContent-Type: image/jpeg\r\nContent-Length: ${frame.length}\r\n\r\n`),
    frame,
    Buffer.from('\r\n'),
  ]);

export interface FrameSink {
  readonly writableNeedDrain: boolean;
  write(chunk: Buffer): boolean;
}

/**
 * Returns a tick that writes the next frame to the sink when it differs from
 * the last one written. Ticks are skipped while the sink is still draining,
 * so a slow client sees fewer frames instead of a growing buffer.
 */
export const createFrameWriter = (sink: FrameSink, nextFrame: () => Buffer | null): (() => void) => {
  let lastFrame: Buffer | null = null;

  return () => {
    if (sink.writableNeedDrain) return;

    const frame = nextFrame();
    if (!frame || frame === lastFrame) return;

    lastFrame = frame;
    sink.write(formatFramePart(frame));
  };
};

// form posts send "true"/"false", JSON clients a boolean
const parseEnable = (value: unknown): boolean | null => {
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return null;
};

export class StreamController {
  constructor(
    private readonly session: SessionService,
    private readonly frameIntervalMs: number,
  ) {}

  // The active camera is looked up on every tick, so a switch shows up on the
  // next frame without the client reconnecting.
  stream(req: Request, res: Response): void {
    res.writeHead(200, {
      'Content-Type': `multipart/x-mixed-replace; boundary=${MJPEG_BOUNDARY}`,
      'Cache-Control': 'no-store',
      Pragma: 'no-cache',
      Connection: 'close',
    });
    res.flushHeaders();

    const writeNextFrame = createFrameWriter(res, () =>
      this.session.isStreamEnabled() ? (this.session.activeFeed()?.latestJpeg() ?? null) : null,
    );
    const timer = setInterval(writeNextFrame, this.frameIntervalMs);

    req.on('close', () => clearInterval(timer));
  }

  toggleStream(req: Request, res: Response): void {
    const enable = parseEnable(req.body?.enable);

    if (enable === null) {
      res.status(400).json({
        error: 'INVALID_REQUEST',
        message: 'enable must be true or false',
      });
      return;
    }

    res.status(200).json({ stream_enabled: this.session.setStreamEnabled(enable) });
  }

  async startCameras(req: Request, res: Response): Promise<void> {
    try {
      const result = await this.session.startCameras();
      res.status(200).json({ status: 'started', ...result });
    } catch (error) {
      sendError(res, error, 'Failed to start cameras');
    }
  }

  async stopCameras(req: Request, res: Response): Promise<void> {
    try {
      await this.session.stopCameras();
      res.status(200).json({ status: 'stopped' });
    } catch (error) {
      sendError(res, error, 'Failed to stop cameras');
    }
  }
}
