import type { CameraDeviceConfig } from '../config/env.config';
import type { CameraLabel, CameraSource } from '../types/camera.types';
import { CameraDevice, type CameraDeviceOptions } from './cameraDevice.service';

export interface CameraStartResult {
  started: CameraLabel[];
  failed: CameraLabel[];
}

export class CameraManager {
  private readonly devices = new Map<CameraLabel, CameraDevice>();

  constructor(devices: CameraDevice[]) {
    if (devices.length === 0) {
      throw new Error('At least one camera must be configured');
    }
    for (const device of devices) {
      this.devices.set(device.label, device);
    }
  }

  // configuration order, first one is the default active camera
  get labels(): CameraLabel[] {
    return Array.from(this.devices.keys());
  }

  has(label: string): boolean {
    return this.devices.has(label);
  }

  get(label: CameraLabel): CameraDevice | undefined {
    return this.devices.get(label);
  }

  isRunning(): boolean {
    return Array.from(this.devices.values()).some((device) => device.isOpen());
  }

  async startAll(): Promise<CameraStartResult> {
    const devices = Array.from(this.devices.values());
    const results = await Promise.allSettled(devices.map((device) => device.start()));

    const result: CameraStartResult = { started: [], failed: [] };
    results.forEach((outcome, index) => {
      const label = devices[index].label;
      if (outcome.status === 'fulfilled') {
        result.started.push(label);
      } else {
        console.error(`❌ Camera ${label} could not be started:`, outcome.reason);
        result.failed.push(label);
      }
    });
    return result;
  }

  async stopAll(): Promise<void> {
    await Promise.all(Array.from(this.devices.values()).map((device) => device.stop()));
  }
}

export const createCameraManager = (
  devices: CameraDeviceConfig[],
  source: CameraSource,
  options: CameraDeviceOptions,
): CameraManager =>
  new CameraManager(
    devices.map(({ label, deviceId }) => new CameraDevice(label, deviceId, source, options)),
  );
