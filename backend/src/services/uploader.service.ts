import * as fs from 'fs';
import * as path from 'path';

export interface ObjectStore {
  readonly bucketName: string;
  uploadFile(localPath: string, key: string): Promise<void>;
}

export interface UploaderOptions {
  localDirectory: string;
  keyPrefix: string;
  minAgeSeconds: number;
  now?: () => number;
}

export interface UploadSummary {
  uploaded: string[];
  failed: string[];
  skipped: string[];
}

const isMissing = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export class UploaderService {
  constructor(
    private readonly store: ObjectStore,
    private readonly options: UploaderOptions,
  ) {}

  keyFor(localPath: string): string {
    const relative = path.relative(this.options.localDirectory, localPath).split(path.sep).join('/');
    return this.options.keyPrefix ? `${this.options.keyPrefix}/${relative}` : relative;
  }

  /**
   * Uploads every file under the local directory that has not been written to
   * for `minAgeSeconds`, deleting each one once the store has it. A failed
   * upload leaves the file in place for the next pass.
   */
  async uploadPendingRecordings(): Promise<UploadSummary> {
    const summary: UploadSummary = { uploaded: [], failed: [], skipped: [] };

    let files: string[];
    try {
      files = await this.listFiles(this.options.localDirectory);
    } catch (error) {
      if (isMissing(error)) {
        console.warn(`⚠️ Nothing to upload, ${this.options.localDirectory} does not exist`);
        return summary;
      }
      throw error;
    }

    const now = this.options.now ? this.options.now() : Date.now();
    const settledBefore = now - this.options.minAgeSeconds * 1000;

    for (const localPath of files) {
      const key = this.keyFor(localPath);
      try {
        const { mtimeMs } = await fs.promises.stat(localPath);
        if (mtimeMs > settledBefore) {
          summary.skipped.push(localPath);
          continue;
        }

        console.log(`☁️ Uploading ${localPath} to ${this.store.bucketName}/${key}`);
        await this.store.uploadFile(localPath, key);
        await fs.promises.unlink(localPath);
        console.log(`☁️ Uploaded and deleted ${localPath}`);
        summary.uploaded.push(localPath);
      } catch (error) {
        // removed since the listing, e.g. a raw stream replaced by its remux
        if (isMissing(error)) {
          console.warn(`⚠️ ${localPath} disappeared before upload`);
          continue;
        }
        console.error(`❌ Upload of ${localPath} failed:`, error);
        summary.failed.push(localPath);
      }
    }

    return summary;
  }

  private async listFiles(directory: string): Promise<string[]> {
    const entries = await fs.promises.readdir(directory, { withFileTypes: true });
    const files: string[] = [];

    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
      const fullPath = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.listFiles(fullPath)));
      } else if (entry.isFile()) {
        files.push(fullPath);
      }
    }
    return files;
  }
}
