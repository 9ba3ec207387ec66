import { describe, it, expect } from 'vitest';
import { describeDevice, formatUsbId, selectReader, type HidDeviceInfo } from '../src/reader/device.js';

const KEYBOARD: HidDeviceInfo = {
  vendorId: 0x046d,
  productId: 0xc31c,
  product: 'USB Keyboard',
  manufacturer: 'Logitech',
  path: '/dev/hidraw0',
};

const READER: HidDeviceInfo = {
  vendorId: 0x25dd,
  productId: 0x3000,
  product: 'TS-HRW380',
  manufacturer: 'Card Tech',
  path: '/dev/hidraw1',
};

const RENAMED_READER: HidDeviceInfo = {
  vendorId: 0x1234,
  productId: 0x0001,
  product: 'TS-HRW380 Rev B',
  manufacturer: null,
  path: '/dev/hidraw2',
};

const MATCH = { vendorId: 0x25dd, productId: 0x3000, knownNames: ['TS-HRW'] };

describe('selectReader', () => {
  it('should prefer an exact vendor and product id match', () => {
    expect(selectReader([KEYBOARD, RENAMED_READER, READER], MATCH)).toBe(READER);
  });

  it('should fall back to the product name', () => {
    expect(selectReader([KEYBOARD, RENAMED_READER], MATCH)).toBe(RENAMED_READER);
  });

  it('should check known names in configured order', () => {
    const match = { vendorId: 0xffff, productId: 0xffff, knownNames: ['Keyboard', 'TS-HRW'] };
    expect(selectReader([RENAMED_READER, KEYBOARD], match)).toBe(KEYBOARD);
  });

  it('should skip devices without a product string', () => {
    const anonymous: HidDeviceInfo = { ...RENAMED_READER, product: null };
    expect(selectReader([anonymous], MATCH)).toBeNull();
  });

  it('should return null when nothing matches', () => {
    expect(selectReader([KEYBOARD], MATCH)).toBeNull();
    expect(selectReader([], MATCH)).toBeNull();
  });
});

describe('formatUsbId', () => {
  it('should render four upper-case hex digits', () => {
    expect(formatUsbId(0x25dd)).toBe('0x25DD');
    expect(formatUsbId(0x1)).toBe('0x0001');
  });
});

describe('describeDevice', () => {
  it('should combine manufacturer, product and ids', () => {
    expect(describeDevice(READER)).toBe('Card Tech TS-HRW380 (VID 0x25DD, PID 0x3000)');
  });

  it('should fall back to Unknown without names', () => {
    const bare: HidDeviceInfo = { ...READER, product: null, manufacturer: null };
    expect(describeDevice(bare)).toBe('Unknown (VID 0x25DD, PID 0x3000)');
  });
});
