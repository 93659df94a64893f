import type {
  ActiveCameraResponse,
  RecordingResponse,
  SessionSnapshot,
  StreamToggleResponse,
} from '../types/session.types';

const API_BASE_URL = import.meta.env.VITE_API_BACKEND_URL || '';

export class ApiError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

const readError = async (response: Response): Promise<ApiError> => {
  const body: unknown = await response.json().catch(() => null);
  if (body && typeof body === 'object' && 'error' in body && 'message' in body) {
    return new ApiError(response.status, String(body.error), String(body.message));
  }
  return new ApiError(response.status, 'HTTP_ERROR', `HTTP ${response.status}`);
};

const request = async <T>(path: string, init?: RequestInit): Promise<T> => {
  const response = await fetch(`${API_BASE_URL}${path}`, init);
  if (!response.ok) {
    throw await readError(response);
  }
  return response.json();
};

const post = <T>(path: string, body?: unknown): Promise<T> =>
  request<T>(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });

export const streamUrl = (): string => `${API_BASE_URL}/stream`;

// Session APIs
export const sessionApi = {
  getStatus: () => request<SessionSnapshot>('/status'),

  toggleCamera: () => post<ActiveCameraResponse>('/toggle'),

  selectCamera: (label: string) => post<ActiveCameraResponse>('/select', { label }),

  startRecording: () => post<RecordingResponse>('/record/start'),

  stopRecording: () => post<RecordingResponse>('/record/stop'),

  setStreamEnabled: (enable: boolean) => post<StreamToggleResponse>('/toggle_stream', { enable }),
};
