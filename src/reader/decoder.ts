import type { Logger } from 'pino';

const CR = 0x0d;
const LF = 0x0a;
const PRINTABLE_MIN = 0x20;
const PRINTABLE_MAX = 0x7e;

export interface FrameDecoderOptions {
  minTokenLength: number;
  maxBufferLength: number;
}

export const DEFAULT_DECODER_OPTIONS: FrameDecoderOptions = {
  minTokenLength: 6,
  maxBufferLength: 256,
};

/**
 * Turns raw HID reports from a keystroke-emulating card reader into card tokens.
 *
 * A token may arrive split over several reports; the trailing segment after the
 * last CR/LF is carried over to the next call. Bytes outside printable ASCII are
 * dropped, never thrown on.
 */
export class FrameDecoder {
  private buffer = '';
  // set after an overflow until the next terminator
  private discarding = false;
  private options: FrameDecoderOptions;
  private logger?: Logger;

  constructor(options: Partial<FrameDecoderOptions> = {}, logger?: Logger) {
    this.options = { ...DEFAULT_DECODER_OPTIONS, ...options };
    this.logger = logger;
  }

  get pending(): string {
    return this.buffer;
  }

  feed(report: Uint8Array): string[] {
    if (report.every((byte) => byte === 0)) {
      // idle poll
      return [];
    }

    let text = '';
    let anomalies = 0;
    for (const byte of report) {
      if (byte === CR || byte === LF) {
        text += '\n';
      } else if (byte >= PRINTABLE_MIN && byte <= PRINTABLE_MAX) {
        text += String.fromCharCode(byte);
      } else if (byte !== 0) {
        anomalies++;
      }
    }

    if (anomalies > 0) {
      this.logger?.debug({ anomalies, reportLength: report.length }, 'Dropped non-printable bytes from reader report');
    }

    const segments = (this.buffer + text).split('\n');
    this.buffer = segments.pop() ?? '';

    if (this.discarding) {
      if (segments.length > 0) {
        // rest of the overflowed run
        segments.shift();
        this.discarding = false;
      } else {
        this.buffer = '';
      }
    }

    if (this.buffer.length > this.options.maxBufferLength) {
      this.logger?.warn(
        { length: this.buffer.length, max: this.options.maxBufferLength },
        'Reader buffer overflow without terminator, discarding'
      );
      this.buffer = '';
      this.discarding = true;
    }

    const tokens: string[] = [];
    for (const segment of segments) {
      const token = segment.trim();
      if (token.length >= this.options.minTokenLength) {
        tokens.push(token);
      } else if (token.length > 0) {
        this.logger?.debug({ length: token.length }, 'Discarded short reader segment');
      }
    }
    return tokens;
  }

  reset(): void {
    this.buffer = '';
    this.discarding = false;
  }
}
