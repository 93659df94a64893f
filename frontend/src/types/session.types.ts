export interface SessionSnapshot {
  labels: string[];
  active: string;
  recording: boolean;
  file: string | null;
  recordingLabel: string | null;
  streamEnabled: boolean;
  camerasRunning: boolean;
}

export interface ActiveCameraResponse {
  active: string;
}

export interface RecordingResponse {
  status: 'recording' | 'stopped';
  file: string;
}

export interface StreamToggleResponse {
  stream_enabled: boolean;
}
