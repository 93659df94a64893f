import ffmpeg from 'fluent-ffmpeg';
import * as fs from 'fs';
import * as path from 'path';
import { PassThrough } from 'stream';
import { DeviceUnavailableError } from '../errors/session.errors';
import type { CameraLabel, FrameFeed, Recorder, Recording } from '../types/camera.types';
import { withExtension } from '../utils/recordingPath';

export interface FfmpegRecorderOptions {
  /** Rate the feed delivers frames at. */
  inputFps: number;
  /** Rate of the encoded file. */
  outputFps: number;
}

/** Repackages a raw H.264 stream into an MP4 container without re-encoding. */
export const remuxToContainer = (input: string, output: string, fps: number): Promise<void> =>
  new Promise((resolve, reject) => {
    ffmpeg(input)
      .inputOptions(['-r', String(fps)])
      .outputOptions(['-c', 'copy', '-loglevel', 'error'])
      .output(output)
      .on('end', () => resolve())
      .on('error', (error: Error) => reject(error))
      .run();
  });

class FfmpegRecording implements Recording {
  private stopping: Promise<string> | null = null;

  constructor(
    readonly label: CameraLabel,
    readonly file: string,
    private readonly rawFile: string,
    private readonly input: PassThrough,
    private readonly encoded: Promise<void>,
    private readonly unsubscribe: () => void,
    private readonly fps: number,
  ) {}

  stop(): Promise<string> {
    if (!this.stopping) {
      this.stopping = this.finish();
    }
    return this.stopping;
  }

  private async finish(): Promise<string> {
    this.unsubscribe();
    if (!this.input.destroyed) {
      this.input.end();
    }

    try {
      await this.encoded;
    } catch (error) {
      console.error(`❌ Encoder for ${this.rawFile} exited with an error:`, error);
    }

    if (!fs.existsSync(this.rawFile)) {
      throw new Error(`Recording produced no output: ${this.rawFile}`);
    }

    try {
      await remuxToContainer(this.rawFile, this.file, this.fps);
      await fs.promises.unlink(this.rawFile);
      console.log(`🎬 Recording saved: ${this.file}`);
      return this.file;
    } catch (error) {
      // without a working remux the elementary stream is the artifact
      console.warn(`⚠️ Remux of ${this.rawFile} failed, keeping the raw stream:`, error);
      return this.rawFile;
    }
  }
}

/**
 * Encodes the JPEG frames of a feed to an H.264 elementary stream next to the
 * requested file, then remuxes it into that file on stop.
 */
export class FfmpegRecorder implements Recorder {
  constructor(private readonly options: FfmpegRecorderOptions) {}

  async start(feed: FrameFeed, file: string): Promise<Recording> {
    await fs.promises.mkdir(path.dirname(file), { recursive: true });
    const rawFile = withExtension(file, '.h264');
    const input = new PassThrough();

    // frames arriving while ffmpeg is behind are dropped, not queued
    const unsubscribe = feed.subscribe((frame) => {
      if (!input.destroyed && !input.writableNeedDrain) {
        input.write(frame);
      }
    });

    const command = ffmpeg(input)
      .inputFormat('mjpeg')
      .inputOptions(['-framerate', String(this.options.inputFps)])
      .videoCodec('libx264')
      .outputOptions(['-preset', 'veryfast', '-pix_fmt', 'yuv420p', '-r', String(this.options.outputFps)])
      .format('h264')
      .output(rawFile);

    const encoded = new Promise<void>((resolve, reject) => {
      command.on('end', () => resolve()).on('error', (error: Error) => {
        unsubscribe();
        input.destroy();
        reject(error);
      });
    });
    encoded.catch((error: unknown) => {
      console.error(`❌ Encoder for ${rawFile} failed:`, error);
    });

    const started = new Promise<void>((resolve, reject) => {
      command.on('start', (commandLine: string) => {
        console.log(`🎬 Encoder started: ${commandLine}`);
        resolve();
      });
      encoded.catch(reject);
    });

    command.run();

    try {
      await started;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DeviceUnavailableError(feed.label, `encoder failed to start: ${reason}`);
    }

    return new FfmpegRecording(feed.label, file, rawFile, input, encoded, unsubscribe, this.options.outputFps);
  }
}
