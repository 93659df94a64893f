import type { CameraLabel } from '../types/camera.types';

export abstract class SessionError extends Error {
  abstract readonly code: string;
  abstract readonly status: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidCameraLabelError extends SessionError {
  readonly code = 'INVALID_CAMERA_LABEL';
  readonly status = 400;

  constructor(readonly label: string, labels: CameraLabel[]) {
    super(`Unknown camera "${label}", expected one of: ${labels.join(', ')}`);
  }
}

export class AlreadyRecordingError extends SessionError {
  readonly code = 'ALREADY_RECORDING';
  readonly status = 409;

  constructor(readonly file: string) {
    super(`A recording is already in progress: ${file}`);
  }
}

export class NotRecordingError extends SessionError {
  readonly code = 'NOT_RECORDING';
  readonly status = 409;

  constructor() {
    super('No recording is in progress');
  }
}

export class DeviceUnavailableError extends SessionError {
  readonly code = 'DEVICE_UNAVAILABLE';
  readonly status = 503;

  constructor(readonly label: CameraLabel, reason?: string) {
    super(`Camera "${label}" is unavailable${reason ? `: ${reason}` : ''}`);
  }
}

export class RecordingInProgressError extends SessionError {
  readonly code = 'RECORDING_IN_PROGRESS';
  readonly status = 409;

  constructor() {
    super('Stop the recording before turning the cameras off');
  }
}
