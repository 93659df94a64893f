import { describe, expect, it } from 'vitest';
import { allocateRecordingPath, withExtension } from '../utils/recordingPath';

describe('allocateRecordingPath', () => {
  it('files recordings by day with a label and local timestamp', () => {
    const file = allocateRecordingPath('/output', 'wide', new Date(2026, 0, 5, 7, 8, 9));

    expect(file).toBe('/output/videos/2026-01-05/wide_20260105_070809.mp4');
  });
});

describe('withExtension', () => {
  it('swaps the extension in place', () => {
    expect(withExtension('/output/videos/2026-01-05/wide_20260105_070809.mp4', '.h264'))
      .toBe('/output/videos/2026-01-05/wide_20260105_070809.h264');
  });
});
