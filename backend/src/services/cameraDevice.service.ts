import { DeviceUnavailableError } from '../errors/session.errors';
import type { CameraLabel, CameraSource, FrameFeed, FrameListener, FrameStream } from '../types/camera.types';
import { sleep as defaultSleep } from '../utils/sleep';

export interface CameraDeviceOptions {
  openAttempts: number;
  openRetryDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * One physical camera. Keeps the latest preview frame and hands every
 * frame to its subscribers (stream clients, a running recording).
 */
export class CameraDevice implements FrameFeed {
  private stream: FrameStream | null = null;
  private latest: Buffer | null = null;
  private detach: Array<() => void> = [];
  private opening: Promise<void> | null = null;
  private readonly listeners = new Set<FrameListener>();

  constructor(
    readonly label: CameraLabel,
    readonly deviceId: string,
    private readonly source: CameraSource,
    private readonly options: CameraDeviceOptions,
  ) {}

  isOpen(): boolean {
    return this.stream !== null;
  }

  latestJpeg(): Buffer | null {
    return this.latest;
  }

  subscribe(listener: FrameListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  start(): Promise<void> {
    if (this.stream) return Promise.resolve();
    if (!this.opening) {
      this.opening = this.open().finally(() => {
        this.opening = null;
      });
    }
    return this.opening;
  }

  async stop(): Promise<void> {
    if (this.opening) {
      await this.opening.catch(() => undefined);
    }
    const stream = this.stream;
    this.release();
    if (stream) {
      await stream.close();
      console.log(`📷 Camera ${this.label} closed`);
    }
  }

  private async open(): Promise<void> {
    const sleep = this.options.sleep ?? defaultSleep;
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.options.openAttempts; attempt++) {
      try {
        const stream = await this.source.openCamera(this.deviceId);
        this.attach(stream);
        console.log(`📷 Camera ${this.label} opened (${this.deviceId})`);
        return;
      } catch (error) {
        lastError = error;
        console.warn(`⚠️ Camera ${this.label} open attempt ${attempt}/${this.options.openAttempts} failed:`, error);
        if (attempt < this.options.openAttempts) {
          await sleep(this.options.openRetryDelayMs);
        }
      }
    }

    throw new DeviceUnavailableError(
      this.label,
      lastError instanceof Error ? lastError.message : undefined,
    );
  }

  private attach(stream: FrameStream): void {
    this.stream = stream;
    this.detach = [
      stream.onFrame((frame) => {
        this.latest = frame;
        this.listeners.forEach((listener) => listener(frame));
      }),
      stream.onError((error) => {
        console.error(`❌ Camera ${this.label} stream failed:`, error);
        this.release();
        stream.close().catch((closeError: unknown) => {
          console.error(`❌ Error closing camera ${this.label}:`, closeError);
        });
      }),
    ];
  }

  private release(): void {
    this.detach.forEach((off) => off());
    this.detach = [];
    this.stream = null;
    this.latest = null;
  }
}
