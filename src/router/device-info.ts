import { z } from 'zod';
import { ProtocolError, TransportError } from '../errors.js';
import type { RouterSession } from '../session/session.js';

export const DEVICE_INFO_PATH = '/api/system/deviceinfo';

export interface DeviceInfo {
  model: string | null;
  softwareVersion: string | null;
}

const deviceInfoSchema = z.object({
  custinfo: z.object({ CustDeviceName: z.string().nullish() }).nullish(),
  SoftwareVersion: z.string().nullish(),
});

/**
 * Read model name and firmware version over an authenticated session.
 */
export async function fetchDeviceInfo(session: RouterSession, timeoutMs?: number): Promise<DeviceInfo> {
  const res = await session.get(DEVICE_INFO_PATH, { timeoutMs });
  if (!res.ok) {
    throw new TransportError(`GET ${DEVICE_INFO_PATH}: HTTP ${res.status}`, res.status);
  }
  const parsed = deviceInfoSchema.safeParse(res.json());
  if (!parsed.success) {
    throw new ProtocolError(`unexpected ${DEVICE_INFO_PATH} response: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return {
    model: parsed.data.custinfo?.CustDeviceName ?? null,
    softwareVersion: parsed.data.SoftwareVersion ?? null,
  };
}
