import type { CameraLabel } from './camera.types';

export interface SessionSnapshot {
  labels: CameraLabel[];
  active: CameraLabel;
  recording: boolean;
  file: string | null;
  recordingLabel: CameraLabel | null;
  streamEnabled: boolean;
  camerasRunning: boolean;
}

export interface SelectCameraRequest {
  label: CameraLabel;
}

export interface ActiveCameraResponse {
  active: CameraLabel;
}

export interface RecordingResponse {
  status: 'recording' | 'stopped';
  file: string;
}

export interface ErrorResponse {
  error: string;
  message: string;
}
