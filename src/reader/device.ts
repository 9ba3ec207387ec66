/**
 * Capability seam between the reader session and the HID library.
 * The session only ever needs to enumerate, open, read with a timeout and close.
 */

export interface HidDeviceInfo {
  vendorId: number;
  productId: number;
  product: string | null;
  manufacturer: string | null;
  path: string | null;
}

export interface HidHandle {
  /** Resolves null when the timeout elapses without a report. */
  read(timeoutMs: number): Promise<Uint8Array | null>;
  close(): Promise<void>;
}

export interface HidBackend {
  enumerate(): Promise<HidDeviceInfo[]>;
  open(device: HidDeviceInfo): Promise<HidHandle>;
}

export interface ReaderMatch {
  vendorId: number;
  productId: number;
  knownNames: string[];
}

/**
 * Exact vendor/product id first, then the first device whose product string
 * contains one of the known reader names (names checked in configured order).
 */
export function selectReader(devices: HidDeviceInfo[], match: ReaderMatch): HidDeviceInfo | null {
  const exact = devices.find((d) => d.vendorId === match.vendorId && d.productId === match.productId);
  if (exact) return exact;

  for (const name of match.knownNames) {
    if (!name) continue;
    const byName = devices.find((d) => d.product?.includes(name));
    if (byName) return byName;
  }
  return null;
}

export function formatUsbId(id: number): string {
  return `0x${id.toString(16).toUpperCase().padStart(4, '0')}`;
}

export function describeDevice(device: HidDeviceInfo): string {
  const name = [device.manufacturer, device.product].filter(Boolean).join(' ') || 'Unknown';
  return `${name} (VID ${formatUsbId(device.vendorId)}, PID ${formatUsbId(device.productId)})`;
}
