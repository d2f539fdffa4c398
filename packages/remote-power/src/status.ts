import { isPowerStatus, PowerStatus } from '@rackpower/core';

/**
 * Maps raw status output to a PowerStatus. Numbers are taken as status codes;
 * text is matched case-insensitively, `off` before `on`.
 */
export function classifyPowerStatus(result: string | number | null | undefined): PowerStatus {
  if (typeof result === 'number') {
    return isPowerStatus(result) ? result : PowerStatus.UNKNOWN;
  }
  if (!result) {
    return PowerStatus.UNKNOWN;
  }

  const text = result.toLowerCase();
  if (text.includes('off')) return PowerStatus.OFF;
  if (text.includes('on')) return PowerStatus.ON;
  return PowerStatus.UNKNOWN;
}
