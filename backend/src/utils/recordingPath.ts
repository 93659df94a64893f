import * as path from 'path';
import type { CameraLabel } from '../types/camera.types';

const pad = (value: number): string => value.toString().padStart(2, '0');

// <outputDir>/videos/YYYY-MM-DD/<label>_YYYYMMDD_HHMMSS.mp4, local time
export const allocateRecordingPath = (outputDir: string, label: CameraLabel, date: Date): string => {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const stamp = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return path.join(outputDir, 'videos', day, `${label}_${stamp}.mp4`);
};

export const withExtension = (file: string, extension: string): string => {
  const parsed = path.parse(file);
  return path.join(parsed.dir, `${parsed.name}${extension}`);
};
