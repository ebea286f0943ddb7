/**
 * @switchyard/disposable - Anonymous device identity
 */

import { randomHex } from '@switchyard/core';

export interface DeviceIdentity {
  /** 32 hex chars */
  deviceId: string;
  /** 16 hex chars */
  sessionId: string;
  /** 24 hex chars */
  fingerprint: string;
}

export function generateIdentity(): DeviceIdentity {
  return {
    deviceId: randomHex(32),
    sessionId: randomHex(16),
    fingerprint: randomHex(24),
  };
}

/** Shortened device id for status output and logs. */
export function maskDeviceId(deviceId: string): string {
  return `${deviceId.slice(0, 16)}...`;
}
