import ffmpeg, { type FfmpegCommand } from 'fluent-ffmpeg';
import { PassThrough } from 'stream';
import type { CameraSource, FrameListener, FrameStream } from '../types/camera.types';
import { JpegFrameSplitter } from '../utils/jpegFrameSplitter';

export interface FfmpegCameraSourceOptions {
  inputFormat: string;
  fps: number;
  width: number;
  height: number;
  openTimeoutMs: number;
}

class FfmpegFrameStream implements FrameStream {
  private readonly frameListeners = new Set<FrameListener>();
  private readonly errorListeners = new Set<(error: Error) => void>();
  private readonly splitter = new JpegFrameSplitter();
  private closed = false;
  private exited = false;

  constructor(private readonly command: FfmpegCommand, output: PassThrough) {
    output.on('data', (chunk: Buffer) => {
      for (const frame of this.splitter.push(chunk)) {
        this.frameListeners.forEach((listener) => listener(frame));
      }
    });

    command.on('error', (error: Error) => {
      this.exited = true;
      if (!this.closed) this.emitError(error);
    });
    command.on('end', () => {
      this.exited = true;
      if (!this.closed) this.emitError(new Error('Camera stream ended'));
    });
  }

  onFrame(listener: FrameListener): () => void {
    this.frameListeners.add(listener);
    return () => this.frameListeners.delete(listener);
  }

  onError(listener: (error: Error) => void): () => void {
    this.errorListeners.add(listener);
    return () => this.errorListeners.delete(listener);
  }

  close(): Promise<void> {
    if (this.closed) return Promise.resolve();
    this.closed = true;
    this.frameListeners.clear();
    this.errorListeners.clear();
    this.splitter.reset();

    if (this.exited) return Promise.resolve();
    return new Promise((resolve) => {
      this.command.once('error', () => resolve());
      this.command.once('end', () => resolve());
      this.command.kill('SIGKILL');
    });
  }

  private emitError(error: Error): void {
    this.errorListeners.forEach((listener) => listener(error));
  }
}

/**
 * Opens a capture device through ffmpeg and reads it back as MJPEG, one
 * JPEG per frame. The device string is passed to ffmpeg as the input, so
 * anything ffmpeg can open with the configured input format works.
 */
export class FfmpegCameraSource implements CameraSource {
  constructor(private readonly options: FfmpegCameraSourceOptions) {}

  openCamera(deviceId: string): Promise<FrameStream> {
    const { inputFormat, fps, width, height, openTimeoutMs } = this.options;
    const output = new PassThrough();

    const command = ffmpeg(deviceId)
      .inputFormat(inputFormat)
      .inputOptions(['-framerate', String(fps)])
      .noAudio()
      .size(`${width}x${height}`)
      .outputOptions(['-q:v', '5'])
      .format('mjpeg');

    const stream = new FfmpegFrameStream(command, output);

    return new Promise<FrameStream>((resolve, reject) => {
      let settled = false;

      const finish = (error: Error | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        stopFrames();
        stopErrors();

        if (error) {
          stream.close().then(() => reject(error), () => reject(error));
        } else {
          resolve(stream);
        }
      };

      const timer = setTimeout(
        () => finish(new Error(`No frames from ${deviceId} within ${openTimeoutMs} ms`)),
        openTimeoutMs,
      );
      const stopFrames = stream.onFrame(() => finish(null));
      const stopErrors = stream.onError((error) => finish(error));

      command.pipe(output, { end: true });
    });
  }
}
