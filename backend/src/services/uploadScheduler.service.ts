import { isInUploadWindow, type UploadWindow } from '../utils/uploadWindow';
import { sleep as defaultSleep } from '../utils/sleep';

export interface UploadSchedulerOptions {
  window: UploadWindow;
  intervalMs: number;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

/** Sleep-and-recheck loop that only lets uploads run inside the nightly window. */
export class UploadScheduler {
  private stopped = false;

  constructor(
    private readonly upload: () => Promise<unknown>,
    private readonly options: UploadSchedulerOptions,
  ) {}

  async tick(): Promise<boolean> {
    const clock = this.options.clock ?? (() => new Date());
    const hour = clock().getHours();
    const { startHour, endHour } = this.options.window;

    if (!isInUploadWindow(hour, this.options.window)) {
      console.log(`🌙 ${hour}:00 is outside the upload window (${startHour}:00-${endHour}:00), waiting`);
      return false;
    }

    console.log(`☁️ ${hour}:00 is inside the upload window, uploading`);
    try {
      await this.upload();
    } catch (error) {
      console.error('❌ Upload pass failed:', error);
    }
    return true;
  }

  async run(): Promise<void> {
    const sleep = this.options.sleep ?? defaultSleep;
    this.stopped = false;

    while (!this.stopped) {
      await this.tick();
      if (this.stopped) break;
      await sleep(this.options.intervalMs);
    }
  }

  stop(): void {
    this.stopped = true;
  }
}
