import { setTimeout as delay } from 'timers/promises';
import type { Logger } from 'pino';
import { systemClock, type Clock } from '../models/clock.js';
import type { CardScanEvent } from '../models/scan.js';
import { FrameDecoder } from './decoder.js';
import { DuplicateSuppressor } from './duplicate.js';
import { ScanQueue } from './queue.js';
import {
  describeDevice,
  selectReader,
  type HidBackend,
  type HidDeviceInfo,
  type HidHandle,
} from './device.js';
import {
  DEFAULT_READER_OPTIONS,
  type ConnectResult,
  type DeviceError,
  type DeviceErrorCode,
  type ReaderOptions,
  type ReaderState,
  type ReaderStatus,
  type ReaderStatusListener,
} from './types.js';

export * from './types.js';
export type { HidBackend, HidDeviceInfo, HidHandle } from './device.js';

export interface ReaderSessionDeps {
  backend: HidBackend;
  logger: Logger;
  clock?: Clock;
  options?: Partial<ReaderOptions>;
}

// one per started poll loop, so a loop that outlives its join timeout can never be revived
interface LoopControl {
  stopped: boolean;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Owns one card reader: the device handle, the poll loop feeding
 * decoder -> duplicate suppressor -> scan queue, and the connection state.
 *
 * disconnected -> connecting -> connected -> (error | disconnected)
 */
export class ReaderSession {
  private backend: HidBackend;
  private logger: Logger;
  private clock: Clock;
  private options: ReaderOptions;

  private decoder: FrameDecoder;
  private suppressor: DuplicateSuppressor;
  private queue: ScanQueue<CardScanEvent>;

  private state: ReaderState = 'disconnected';
  private monitoring = false;
  private handle: HidHandle | null = null;
  private device: HidDeviceInfo | null = null;
  private lastError: DeviceError | null = null;
  private control: LoopControl | null = null;
  private loop: Promise<void> | null = null;
  private connecting: Promise<ConnectResult> | null = null;
  private teardown: Promise<void> | null = null;
  private listeners = new Set<ReaderStatusListener>();

  constructor(deps: ReaderSessionDeps) {
    this.backend = deps.backend;
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
    this.options = { ...DEFAULT_READER_OPTIONS, ...deps.options };

    this.decoder = new FrameDecoder({ minTokenLength: this.options.minTokenLength }, this.logger);
    this.suppressor = new DuplicateSuppressor(this.options.duplicateWindowMs);
    this.queue = new ScanQueue(this.options.queueCapacity);
  }

  async connect(): Promise<ConnectResult> {
    if (this.teardown) {
      await this.teardown;
    }
    if (this.connecting) {
      return this.connecting;
    }
    if (this.state === 'connected' && this.device) {
      return { ok: true, device: this.device };
    }
    if (this.state === 'error') {
      this.logger.info('Reconnecting card reader after error');
      await this.disconnect();
    }

    const attempt = this.openReader();
    this.connecting = attempt;
    // listeners may call disconnect() and must see the attempt in flight
    this.setState('connecting');
    try {
      return await attempt;
    } finally {
      this.connecting = null;
    }
  }

  /**
   * Safe from any state and under concurrent calls; always ends disconnected.
   */
  disconnect(): Promise<void> {
    if (!this.teardown) {
      this.teardown = this.closeReader().finally(() => {
        this.teardown = null;
      });
    }
    return this.teardown;
  }

  async readCard(timeoutMs: number): Promise<string | null> {
    const scan = await this.readScan(timeoutMs);
    return scan?.cardId ?? null;
  }

  tryReadCard(): string | null {
    if (this.state === 'disconnected') return null;
    return this.queue.tryPop()?.cardId ?? null;
  }

  readScan(timeoutMs: number): Promise<CardScanEvent | null> {
    if (this.state === 'disconnected') {
      return Promise.resolve(null);
    }
    return this.queue.pop(timeoutMs);
  }

  status(): ReaderStatus {
    return {
      state: this.state,
      connected: this.state === 'connected',
      monitoring: this.monitoring,
      lastError: this.lastError,
      device: this.device,
      queued: this.queue.size,
    };
  }

  onStatusChange(listener: ReaderStatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  listDevices(): Promise<HidDeviceInfo[]> {
    return this.backend.enumerate();
  }

  private async openReader(): Promise<ConnectResult> {
    let devices: HidDeviceInfo[];
    try {
      devices = await this.backend.enumerate();
    } catch (err) {
      this.logger.error({ err }, 'HID enumeration failed');
      return this.connectFailed('device_unavailable', `HID enumeration failed: ${errorMessage(err)}`);
    }

    const target = selectReader(devices, this.options);
    if (!target) {
      this.logger.warn(
        { vendorId: this.options.vendorId, productId: this.options.productId, knownNames: this.options.knownNames },
        'Card reader not found'
      );
      this.logger.debug({ devices: devices.map(describeDevice) }, 'Available HID devices');
      return this.connectFailed('device_unavailable', 'No matching card reader found');
    }

    let handle: HidHandle;
    try {
      handle = await this.backend.open(target);
    } catch (err) {
      this.logger.error({ err, device: describeDevice(target) }, 'Failed to open card reader');
      return this.connectFailed(
        'connection_failed',
        `Failed to open ${describeDevice(target)}: ${errorMessage(err)}`
      );
    }

    const control: LoopControl = { stopped: false };
    this.handle = handle;
    this.device = target;
    this.lastError = null;
    this.control = control;
    this.state = 'connected';
    this.monitoring = true;
    this.loop = this.poll(handle, control);

    this.logger.info({ device: describeDevice(target) }, 'Card reader connected');
    this.notify();
    return { ok: true, device: target };
  }

  private connectFailed(code: DeviceErrorCode, message: string): ConnectResult {
    const error: DeviceError = { code, message };
    this.lastError = error;
    this.setState('disconnected');
    return { ok: false, error };
  }

  private async poll(handle: HidHandle, control: LoopControl): Promise<void> {
    let consecutiveErrors = 0;

    while (!control.stopped) {
      let report: Uint8Array | null;
      try {
        report = await handle.read(this.options.readTimeoutMs);
      } catch (err) {
        if (control.stopped) break;

        consecutiveErrors++;
        this.logger.warn(
          { err, consecutiveErrors, maxConsecutiveErrors: this.options.maxConsecutiveErrors },
          'Card reader read failed'
        );

        if (consecutiveErrors >= this.options.maxConsecutiveErrors) {
          this.lastError = {
            code: 'read_error',
            message: `Reader stopped after ${consecutiveErrors} consecutive read errors: ${errorMessage(err)}`,
          };
          this.monitoring = false;
          this.state = 'error';
          this.logger.error({ consecutiveErrors }, 'Card reader poll loop halted');
          this.notify();
          return;
        }

        await delay(this.options.retryDelayMs);
        continue;
      }

      consecutiveErrors = 0;
      if (report && !control.stopped) {
        this.ingest(report);
      }
    }
  }

  private ingest(report: Uint8Array): void {
    const now = this.clock.now();

    for (const cardId of this.decoder.feed(report)) {
      if (!this.suppressor.accept(cardId, now)) {
        this.logger.debug({ cardId }, 'Suppressed repeated card read');
        continue;
      }

      const evicted = this.queue.push({ cardId, observedAt: now });
      this.logger.info({ cardId }, 'Card scanned');
      if (evicted) {
        this.logger.warn({ dropped: evicted.cardId, capacity: this.queue.capacity }, 'Scan queue full, dropped oldest scan');
      }
    }
  }

  private async closeReader(): Promise<void> {
    if (this.connecting) {
      await this.connecting;
    }

    const control = this.control;
    const loop = this.loop;
    if (control) {
      control.stopped = true;
    }
    if (loop) {
      const joined = await Promise.race([
        loop.then(() => true),
        delay(this.options.joinTimeoutMs, false, { ref: false }),
      ]);
      if (!joined) {
        this.logger.warn({ joinTimeoutMs: this.options.joinTimeoutMs }, 'Reader poll loop did not stop in time');
      }
    }

    const handle = this.handle;
    this.handle = null;
    if (handle) {
      try {
        await handle.close();
        this.logger.info('Card reader disconnected');
      } catch (err) {
        this.logger.error({ err }, 'Failed to close card reader');
      }
    }

    this.control = null;
    this.loop = null;
    this.device = null;
    this.monitoring = false;
    this.decoder.reset();
    this.suppressor.reset();
    this.queue.clear();
    this.setState('disconnected');
  }

  private setState(state: ReaderState): void {
    if (this.state === state) return;
    this.state = state;
    this.notify();
  }

  private notify(): void {
    const status = this.status();
    for (const listener of this.listeners) {
      try {
        listener(status);
      } catch (err) {
        this.logger.error({ err }, 'Reader status listener failed');
      }
    }
  }
}
