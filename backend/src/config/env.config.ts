import dotenv from 'dotenv';

dotenv.config();

export interface CameraDeviceConfig {
  label: string;
  deviceId: string;
}

// "wide=/dev/video0,narrow=/dev/video2" -> [{ label: 'wide', deviceId: '/dev/video0' }, ...]
export const parseCameraDevices = (value: string): CameraDeviceConfig[] => {
  const devices: CameraDeviceConfig[] = [];

  for (const entry of value.split(',')) {
    const trimmed = entry.trim();
    if (!trimmed) continue;

    const separator = trimmed.indexOf('=');
    if (separator <= 0 || separator === trimmed.length - 1) {
      throw new Error(`Invalid CAMERA_DEVICES entry "${trimmed}", expected label=device`);
    }

    const label = trimmed.slice(0, separator).trim();
    if (devices.some((device) => device.label === label)) {
      throw new Error(`Duplicate camera label "${label}" in CAMERA_DEVICES`);
    }
    devices.push({ label, deviceId: trimmed.slice(separator + 1).trim() });
  }

  if (devices.length === 0) {
    throw new Error('CAMERA_DEVICES must name at least one camera');
  }
  return devices;
};

const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = value === undefined ? NaN : parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export const config = {
  port: toInt(process.env.PORT, 8800),
  frontendDist: process.env.FRONTEND_DIST || '',
  outputDir: process.env.OUTPUT_DIR || '/output',
  cameras: {
    devices: parseCameraDevices(process.env.CAMERA_DEVICES || 'wide=/dev/video0,narrow=/dev/video2'),
    inputFormat: process.env.CAMERA_INPUT_FORMAT || 'v4l2',
    previewFps: toInt(process.env.PREVIEW_FPS, 15),
    previewWidth: toInt(process.env.PREVIEW_WIDTH, 640),
    previewHeight: toInt(process.env.PREVIEW_HEIGHT, 360),
    recordFps: toInt(process.env.RECORD_FPS, 30),
    openAttempts: toInt(process.env.CAMERA_OPEN_ATTEMPTS, 10),
    openRetryDelayMs: toInt(process.env.CAMERA_OPEN_RETRY_DELAY_MS, 1000),
    openTimeoutMs: toInt(process.env.CAMERA_OPEN_TIMEOUT_MS, 5000),
  },
  upload: {
    startHour: toInt(process.env.UPLOAD_START_HOUR, 20),
    endHour: toInt(process.env.UPLOAD_END_HOUR, 4),
    checkIntervalMs: toInt(process.env.UPLOAD_CHECK_INTERVAL_MS, 60 * 60 * 1000),
    minAgeSeconds: toInt(process.env.UPLOAD_MIN_AGE_SECONDS, 60),
    deviceNamePrefix: process.env.DEVICE_NAME_PREFIX || 'cam',
    serialNumberPath: process.env.DEVICE_SERIAL_PATH || '/sys/firmware/devicetree/base/serial-number',
  },
  aws: {
    region: process.env.AWS_REGION || 'us-east-1',
    accessKeyId: process.env.AWS_ACCESS_KEY_ID || '',
    secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY || '',
    s3BucketName: process.env.AWS_S3_BUCKET_NAME || '',
    endpoint: process.env.AWS_S3_ENDPOINT || '',
    prefix: process.env.AWS_S3_PREFIX || 'audit-cams',
  },
};

export type AppConfig = typeof config;
