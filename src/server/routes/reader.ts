import { FastifyPluginAsync } from 'fastify';
import { describeDevice, formatUsbId, type HidDeviceInfo } from '../../reader/device.js';

function serializeDevice(device: HidDeviceInfo) {
  return {
    vendorId: formatUsbId(device.vendorId),
    productId: formatUsbId(device.productId),
    product: device.product,
    manufacturer: device.manufacturer,
    description: describeDevice(device),
  };
}

const readerRoutes: FastifyPluginAsync = async (fastify) => {
  const { station, kioskLogger: logger } = fastify;

  fastify.get('/api/reader/status', async () => {
    const status = station.status();
    return {
      state: status.state,
      connected: status.connected,
      monitoring: status.monitoring,
      lastError: status.lastError,
      device: status.device ? serializeDevice(status.device) : null,
      queued: status.queued,
    };
  });

  fastify.post('/api/reader/connect', async (request, reply) => {
    const result = await station.connect();
    if (!result.ok) {
      return reply.code(503).send({ error: result.error.message, code: result.error.code });
    }
    return { connected: true, device: serializeDevice(result.device) };
  });

  fastify.post('/api/reader/disconnect', async () => {
    await station.disconnect();
    return { connected: false };
  });

  fastify.get('/api/reader/devices', async (request, reply) => {
    try {
      const devices = await station.listDevices();
      return { devices: devices.map(serializeDevice) };
    } catch (err) {
      logger.error({ err }, 'Failed to list HID devices');
      return reply.code(500).send({ error: 'Failed to list HID devices' });
    }
  });
};

export default readerRoutes;
