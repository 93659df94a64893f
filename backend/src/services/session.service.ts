import {
  AlreadyRecordingError,
  DeviceUnavailableError,
  InvalidCameraLabelError,
  NotRecordingError,
  RecordingInProgressError,
} from '../errors/session.errors';
import type { SessionSnapshot } from '../types/api.types';
import type { CameraLabel, FrameFeed, Recorder, Recording } from '../types/camera.types';
import { Mutex } from '../utils/mutex';
import { allocateRecordingPath } from '../utils/recordingPath';
import type { CameraManager, CameraStartResult } from './cameraManager.service';

export interface SessionServiceOptions {
  outputDir: string;
  now?: () => Date;
}

export type SessionListener = (snapshot: SessionSnapshot) => void;

/**
 * Active camera and recording state for the process. Every transition runs
 * under one mutex, so concurrent requests observe them in order.
 *
 * A recording stays bound to the camera it was started on; switching the
 * active camera only changes what is streamed and what the next recording
 * will capture.
 */
export class SessionService {
  private activeLabel: CameraLabel;
  private recording: Recording | null = null;
  private streamEnabled = true;
  private readonly mutex = new Mutex();
  private readonly listeners = new Set<SessionListener>();

  constructor(
    private readonly cameras: CameraManager,
    private readonly recorder: Recorder,
    private readonly options: SessionServiceOptions,
  ) {
    this.activeLabel = cameras.labels[0];
  }

  get active(): CameraLabel {
    return this.activeLabel;
  }

  isRecording(): boolean {
    return this.recording !== null;
  }

  isStreamEnabled(): boolean {
    return this.streamEnabled;
  }

  activeFeed(): FrameFeed | undefined {
    return this.cameras.get(this.activeLabel);
  }

  snapshot(): SessionSnapshot {
    return {
      labels: this.cameras.labels,
      active: this.activeLabel,
      recording: this.recording !== null,
      file: this.recording?.file ?? null,
      recordingLabel: this.recording?.label ?? null,
      streamEnabled: this.streamEnabled,
      camerasRunning: this.cameras.isRunning(),
    };
  }

  onChange(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  selectCamera(label: string): Promise<CameraLabel> {
    return this.mutex.runExclusive(() => {
      if (!this.cameras.has(label)) {
        throw new InvalidCameraLabelError(label, this.cameras.labels);
      }
      this.activeLabel = label;
      console.log(`📷 Active camera: ${label}`);
      this.notify();
      return label;
    });
  }

  toggleCamera(): Promise<CameraLabel> {
    return this.mutex.runExclusive(() => {
      const labels = this.cameras.labels;
      const next = labels[(labels.indexOf(this.activeLabel) + 1) % labels.length];
      this.activeLabel = next;
      console.log(`📷 Active camera: ${next}`);
      this.notify();
      return next;
    });
  }

  startRecording(): Promise<string> {
    return this.mutex.runExclusive(async () => {
      if (this.recording) {
        throw new AlreadyRecordingError(this.recording.file);
      }

      const label = this.activeLabel;
      const device = this.cameras.get(label);
      if (!device || !device.isOpen()) {
        throw new DeviceUnavailableError(label, 'camera is not running');
      }

      const now = this.options.now ?? (() => new Date());
      const file = allocateRecordingPath(this.options.outputDir, label, now());
      this.recording = await this.recorder.start(device, file);

      console.log(`🎬 Recording ${label} to ${file}`);
      this.notify();
      return file;
    });
  }

  stopRecording(): Promise<string> {
    return this.mutex.runExclusive(async () => {
      const recording = this.recording;
      if (!recording) {
        throw new NotRecordingError();
      }

      try {
        return await recording.stop();
      } finally {
        this.recording = null;
        this.notify();
      }
    });
  }

  setStreamEnabled(enabled: boolean): boolean {
    this.streamEnabled = enabled;
    console.log(`📺 Streaming ${enabled ? 'enabled' : 'disabled'}`);
    this.notify();
    return enabled;
  }

  startCameras(): Promise<CameraStartResult> {
    return this.mutex.runExclusive(async () => {
      const result = await this.cameras.startAll();
      this.notify();
      return result;
    });
  }

  stopCameras(): Promise<void> {
    return this.mutex.runExclusive(async () => {
      if (this.recording) {
        throw new RecordingInProgressError();
      }
      await this.cameras.stopAll();
      this.notify();
    });
  }

  private notify(): void {
    const snapshot = this.snapshot();
    this.listeners.forEach((listener) => {
      try {
        listener(snapshot);
      } catch (error) {
        console.error('Error in session listener:', error);
      }
    });
  }
}
