import { describe, it, expect } from 'vitest';
import { fetchDeviceInfo, DEVICE_INFO_PATH } from '../src/router/device-info.js';
import { RouterAuthClient } from '../src/router/handshake.js';
import { RouterSession, type FetchLike } from '../src/session/session.js';
import { ProtocolError } from '../src/errors.js';
import { MOCK_PASSWORD, MockRouter } from './support/mock-router.js';

function jsonSession(body: unknown): RouterSession {
  const fetch: FetchLike = async () => ({
    status: 200,
    ok: true,
    headers: new Headers({ 'content-type': 'application/json' }),
    text: async () => JSON.stringify(body),
  });
  return new RouterSession('192.168.3.1', { fetch });
}

describe('fetchDeviceInfo', () => {
  it('reads model and firmware over an authenticated session', async () => {
    const router = new MockRouter();
    const session = await new RouterAuthClient('192.168.3.1', { fetch: router.fetch }).authenticate('admin', MOCK_PASSWORD);

    await expect(fetchDeviceInfo(session)).resolves.toEqual({ model: 'AX2 Test', softwareVersion: '10.0.5.1' });
    expect(router.trace.at(-1)).toBe(`GET ${DEVICE_INFO_PATH}`);
  });

  it('raises TransportError without a live session', async () => {
    const router = new MockRouter();
    const session = new RouterSession('192.168.3.1', { fetch: router.fetch });
    await expect(fetchDeviceInfo(session)).rejects.toMatchObject({
      kind: 'transport',
      status: 404,
      message: `GET ${DEVICE_INFO_PATH}: HTTP 404`,
    });
  });

  it('maps missing fields to null', async () => {
    await expect(fetchDeviceInfo(jsonSession({}))).resolves.toEqual({ model: null, softwareVersion: null });
    await expect(fetchDeviceInfo(jsonSession({ custinfo: {} }))).resolves.toEqual({ model: null, softwareVersion: null });
  });

  it('raises ProtocolError on a body of the wrong shape', async () => {
    await expect(fetchDeviceInfo(jsonSession({ SoftwareVersion: 10 }))).rejects.toBeInstanceOf(ProtocolError);
  });
});
