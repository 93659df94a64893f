export interface UploadWindow {
  startHour: number;
  endHour: number;
}

/**
 * Whether a local hour (0-23) falls inside the window. A window whose start
 * is after its end wraps past midnight: 20 -> 4 covers 20:00-03:59.
 */
export const isInUploadWindow = (hour: number, window: UploadWindow): boolean => {
  const { startHour, endHour } = window;
  if (startHour === endHour) return true;
  if (startHour < endHour) return hour >= startHour && hour < endHour;
  return hour >= startHour || hour < endHour;
};
