import * as HID from 'node-hid';
import type { HidBackend, HidDeviceInfo, HidHandle } from './device.js';

class NodeHidHandle implements HidHandle {
  private device: HID.HIDAsync;

  constructor(device: HID.HIDAsync) {
    this.device = device;
  }

  async read(timeoutMs: number): Promise<Uint8Array | null> {
    // runs on a libuv worker thread
    const data = await this.device.read(timeoutMs);
    if (!data || data.length === 0) {
      return null;
    }
    return data;
  }

  async close(): Promise<void> {
    await this.device.close();
  }
}

/**
 * node-hid backed reader access. HIDAsync reads never block the event loop:
 * every read is bounded by the timeout passed in.
 */
export class NodeHidBackend implements HidBackend {
  async enumerate(): Promise<HidDeviceInfo[]> {
    const devices = await HID.devicesAsync();
    return devices.map((d) => ({
      vendorId: d.vendorId,
      productId: d.productId,
      product: d.product ?? null,
      manufacturer: d.manufacturer ?? null,
      path: d.path ?? null,
    }));
  }

  async open(device: HidDeviceInfo): Promise<HidHandle> {
    const handle = device.path
      ? await HID.HIDAsync.open(device.path)
      : await HID.HIDAsync.open(device.vendorId, device.productId);
    return new NodeHidHandle(handle);
  }
}
