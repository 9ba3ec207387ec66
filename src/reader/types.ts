import type { HidDeviceInfo } from './device.js';

export type ReaderState = 'disconnected' | 'connecting' | 'connected' | 'error';

export type DeviceErrorCode = 'device_unavailable' | 'connection_failed' | 'read_error';

export interface DeviceError {
  code: DeviceErrorCode;
  message: string;
}

export type ConnectResult =
  | { ok: true; device: HidDeviceInfo }
  | { ok: false; error: DeviceError };

export interface ReaderStatus {
  state: ReaderState;
  connected: boolean;
  monitoring: boolean;
  lastError: DeviceError | null;
  device: HidDeviceInfo | null;
  queued: number;
}

export type ReaderStatusListener = (status: ReaderStatus) => void;

export interface ReaderOptions {
  vendorId: number;
  productId: number;
  knownNames: string[];
  readTimeoutMs: number;
  retryDelayMs: number;
  maxConsecutiveErrors: number;
  joinTimeoutMs: number;
  queueCapacity: number;
  duplicateWindowMs: number;
  minTokenLength: number;
}

// TS-HRW380 desktop reader
export const DEFAULT_READER_OPTIONS: ReaderOptions = {
  vendorId: 0x25dd,
  productId: 0x3000,
  knownNames: ['TS-HRW'],
  readTimeoutMs: 100,
  retryDelayMs: 100,
  maxConsecutiveErrors: 3,
  joinTimeoutMs: 2000,
  queueCapacity: 10,
  duplicateWindowMs: 2000,
  minTokenLength: 6,
};
