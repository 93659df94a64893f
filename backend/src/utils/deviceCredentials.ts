import { createHash } from 'crypto';
import * as fs from 'fs';

export interface DeviceCredentials {
  deviceName: string;
  user: string;
  password: string;
}

export const PASSWORD_LENGTH = 15;

export const readDeviceSerial = async (serialPath: string): Promise<string> => {
  const raw = await fs.promises.readFile(serialPath, 'utf8');
  return raw.replace(/\0/g, '').trim();
};

/**
 * Device identity is characters 9-16 of the board serial behind a fixed
 * prefix; the password is the leading hex of its sha256.
 */
export const deriveDeviceCredentials = (serial: string, prefix: string): DeviceCredentials => {
  const deviceName = `${prefix}${serial.substring(8, 16)}`;
  const password = createHash('sha256').update(deviceName).digest('hex').substring(0, PASSWORD_LENGTH);
  return { deviceName, user: deviceName, password };
};
