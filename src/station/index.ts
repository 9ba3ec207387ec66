import { setTimeout as delay } from 'timers/promises';
import type { Logger } from 'pino';
import type { AuthenticationService, AuthResult } from '../auth/index.js';
import type { CardScanEvent } from '../models/scan.js';
import type {
  ConnectResult,
  HidDeviceInfo,
  ReaderSession,
  ReaderStatus,
  ReaderStatusListener,
} from '../reader/index.js';

export interface ScanOutcome {
  scan: CardScanEvent;
  result: AuthResult;
}

export type ScanHandler = (outcome: ScanOutcome) => void | Promise<void>;

export interface StationOptions {
  pollTimeoutMs: number;
  joinTimeoutMs: number;
}

export const DEFAULT_STATION_OPTIONS: StationOptions = {
  pollTimeoutMs: 200,
  joinTimeoutMs: 2000,
};

export interface KioskStationDeps {
  reader: ReaderSession;
  auth: AuthenticationService;
  logger: Logger;
  options?: Partial<StationOptions>;
}

interface Monitor {
  stopped: boolean;
  loop: Promise<void>;
  unsubscribe: () => void;
}

/**
 * What the kiosk UI talks to: scans from the reader are turned into login
 * attempts and handed to the UI callback one at a time.
 */
export class KioskStation {
  private reader: ReaderSession;
  private auth: AuthenticationService;
  private logger: Logger;
  private options: StationOptions;
  private monitor: Monitor | null = null;
  private last: ScanOutcome | null = null;

  constructor(deps: KioskStationDeps) {
    this.reader = deps.reader;
    this.auth = deps.auth;
    this.logger = deps.logger;
    this.options = { ...DEFAULT_STATION_OPTIONS, ...deps.options };
  }

  startMonitoring(onCard: ScanHandler, onStatus?: ReaderStatusListener): boolean {
    if (this.monitor) {
      return false;
    }

    const unsubscribe = onStatus ? this.reader.onStatusChange(onStatus) : () => undefined;
    const monitor: Monitor = { stopped: false, loop: Promise.resolve(), unsubscribe };
    monitor.loop = this.consume(monitor, onCard);
    this.monitor = monitor;

    this.logger.info('Scan monitoring started');
    return true;
  }

  async stopMonitoring(): Promise<void> {
    const monitor = this.monitor;
    if (!monitor) return;

    this.monitor = null;
    monitor.stopped = true;
    monitor.unsubscribe();

    const joined = await Promise.race([
      monitor.loop.then(() => true),
      delay(this.options.joinTimeoutMs, false, { ref: false }),
    ]);
    if (!joined) {
      this.logger.warn({ joinTimeoutMs: this.options.joinTimeoutMs }, 'Scan consumer did not stop in time');
    }
    this.logger.info('Scan monitoring stopped');
  }

  isMonitoring(): boolean {
    return this.monitor !== null;
  }

  lastScan(): ScanOutcome | null {
    return this.last;
  }

  connect(): Promise<ConnectResult> {
    return this.reader.connect();
  }

  disconnect(): Promise<void> {
    return this.reader.disconnect();
  }

  readCard(timeoutMs: number): Promise<string | null> {
    return this.reader.readCard(timeoutMs);
  }

  status(): ReaderStatus {
    return this.reader.status();
  }

  listDevices(): Promise<HidDeviceInfo[]> {
    return this.reader.listDevices();
  }

  private async consume(monitor: Monitor, onCard: ScanHandler): Promise<void> {
    while (!monitor.stopped) {
      const scan = await this.reader.readScan(this.options.pollTimeoutMs);
      if (!scan) {
        // a disconnected reader answers immediately
        if (!monitor.stopped && this.reader.status().state === 'disconnected') {
          await delay(this.options.pollTimeoutMs);
        }
        continue;
      }
      if (monitor.stopped) {
        this.logger.debug({ cardId: scan.cardId }, 'Scan arrived after monitoring stopped, ignoring');
        break;
      }

      let result: AuthResult;
      try {
        result = await this.auth.authenticate(scan.cardId);
      } catch (err) {
        this.logger.error({ err, cardId: scan.cardId }, 'Authentication of scanned card failed');
        continue;
      }

      const outcome: ScanOutcome = { scan, result };
      this.last = outcome;

      try {
        await onCard(outcome);
      } catch (err) {
        this.logger.error({ err, cardId: scan.cardId }, 'Scan handler failed');
      }
    }
  }
}
