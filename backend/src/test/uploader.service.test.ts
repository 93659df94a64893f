import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { UploaderService, type ObjectStore } from '../services/uploader.service';

const NOW = new Date(2026, 9, 18, 22, 0, 0).getTime();

describe('UploaderService', () => {
  let root: string;
  let videos: string;

  const writeRecording = async (relative: string, ageSeconds: number) => {
    const file = path.join(videos, relative);
    await fs.promises.mkdir(path.dirname(file), { recursive: true });
    await fs.promises.writeFile(file, 'frames');
    const time = new Date(NOW - ageSeconds * 1000);
    await fs.promises.utimes(file, time, time);
    return file;
  };

  const fakeStore = (): ObjectStore & { uploadFile: Mock<(localPath: string, key: string) => Promise<void>> } => ({
    bucketName: 'test-bucket',
    uploadFile: vi.fn<(localPath: string, key: string) => Promise<void>>(async () => undefined),
  });

  beforeEach(async () => {
    root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'uploader-'));
    videos = path.join(root, 'videos');
  });

  afterEach(async () => {
    await fs.promises.rm(root, { recursive: true, force: true });
  });

  it('uploads settled recordings under the device prefix and deletes them', async () => {
    const wide = await writeRecording('2026-10-18/wide_20261018_101500.mp4', 3600);
    const narrow = await writeRecording('2026-10-18/narrow_20261018_111500.h264', 3600);
    const store = fakeStore();
    const uploader = new UploaderService(store, {
      localDirectory: videos,
      keyPrefix: 'audit-cams/cam1234abcd',
      minAgeSeconds: 60,
      now: () => NOW,
    });

    const summary = await uploader.uploadPendingRecordings();

    expect(summary).toEqual({ uploaded: [narrow, wide], failed: [], skipped: [] });
    expect(store.uploadFile).toHaveBeenCalledWith(wide, 'audit-cams/cam1234abcd/2026-10-18/wide_20261018_101500.mp4');
    expect(store.uploadFile).toHaveBeenCalledWith(narrow, 'audit-cams/cam1234abcd/2026-10-18/narrow_20261018_111500.h264');
    expect(fs.existsSync(wide)).toBe(false);
    expect(fs.existsSync(narrow)).toBe(false);
  });

  it('leaves files that are still being written', async () => {
    const fresh = await writeRecording('2026-10-18/wide_20261018_215930.h264', 5);
    const store = fakeStore();
    const uploader = new UploaderService(store, { localDirectory: videos, keyPrefix: 'p', minAgeSeconds: 60, now: () => NOW });

    await expect(uploader.uploadPendingRecordings()).resolves.toEqual({ uploaded: [], failed: [], skipped: [fresh] });
    expect(store.uploadFile).not.toHaveBeenCalled();
    expect(fs.existsSync(fresh)).toBe(true);
  });

  it('keeps a file whose upload failed and carries on', async () => {
    const first = await writeRecording('a.mp4', 600);
    const second = await writeRecording('b.mp4', 600);
    const store = fakeStore();
    store.uploadFile.mockRejectedValueOnce(new Error('403 Forbidden'));
    const uploader = new UploaderService(store, { localDirectory: videos, keyPrefix: 'p', minAgeSeconds: 60, now: () => NOW });

    await expect(uploader.uploadPendingRecordings()).resolves.toEqual({ uploaded: [second], failed: [first], skipped: [] });
    expect(fs.existsSync(first)).toBe(true);
    expect(fs.existsSync(second)).toBe(false);
  });

  it('passes over a file removed after the directory was listed', async () => {
    const first = await writeRecording('a.mp4', 600);
    const removed = await writeRecording('b.h264', 600);
    const last = await writeRecording('c.mp4', 600);
    const store = fakeStore();
    store.uploadFile.mockImplementationOnce(async () => {
      await fs.promises.unlink(removed);
    });
    const uploader = new UploaderService(store, { localDirectory: videos, keyPrefix: 'p', minAgeSeconds: 60, now: () => NOW });

    await expect(uploader.uploadPendingRecordings()).resolves.toEqual({ uploaded: [first, last], failed: [], skipped: [] });
    expect(store.uploadFile).toHaveBeenCalledTimes(2);
    expect(store.uploadFile).toHaveBeenLastCalledWith(last, 'p/c.mp4');
  });

  it('does nothing when the directory does not exist yet', async () => {
    const store = fakeStore();
    const uploader = new UploaderService(store, { localDirectory: videos, keyPrefix: 'p', minAgeSeconds: 60, now: () => NOW });

    await expect(uploader.uploadPendingRecordings()).resolves.toEqual({ uploaded: [], failed: [], skipped: [] });
  });
});
