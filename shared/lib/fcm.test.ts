import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { generateKeyPairSync } from 'node:crypto';
import { createFcmSender, loadServiceAccountFromEnv, shouldDryRun } from './fcm';

const mockFetch = vi.fn();

const { privateKey } = generateKeyPairSync('rsa', { modulusLength: 2048 });
const serviceAccount = {
  client_email: 'sender@test-project.iam.gserviceaccount.com',
  private_key: privateKey.export({ type: 'pkcs8', format: 'pem' }).toString(),
  project_id: 'test-project',
};

describe('FCM sender', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('reads a service account from JSON or base64', () => {
    const json = JSON.stringify(serviceAccount);
    expect(loadServiceAccountFromEnv(json).projectId).toBe('test-project');
    expect(loadServiceAccountFromEnv(Buffer.from(json).toString('base64'), 'other-project').projectId).toBe('other-project');
    expect(() => loadServiceAccountFromEnv('{"client_email": "x"}')).toThrow('Service account missing private_key');
  });

  it('logs instead of sending without credentials', async () => {
    const sender = createFcmSender({});
    await sender.send({ deviceToken: 'device-1', title: 'T', body: 'B', data: { reminder_id: 'r1' } });

    expect(mockFetch).not.toHaveBeenCalled();
    expect(console.log).toHaveBeenCalledWith('DRY RUN: would send to', 'device-1', { reminder_id: 'r1' });
  });

  it('skips messages without a device token', async () => {
    const sender = createFcmSender({ serviceAccountJson: JSON.stringify(serviceAccount) });
    await sender.send({ deviceToken: null, title: 'T', body: 'B', data: {} });

    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('exchanges a signed JWT once and reuses the access token', async () => {
    mockFetch.mockImplementation(async (url: string) => {
      if (url === 'https://oauth2.googleapis.com/token') {
        return new Response(JSON.stringify({ access_token: 'test-access-token', expires_in: 3600 }), { status: 200 });
      }
      return new Response('{}', { status: 200 });
    });

    const sender = createFcmSender({ serviceAccountJson: JSON.stringify(serviceAccount) });
    await sender.send({ deviceToken: 'device-1', title: 'Move your car', body: 'Soon', data: { reminder_id: 'r1' } });
    await sender.send({ deviceToken: 'device-2', title: 'Move your car', body: 'Soon', data: { reminder_id: 'r2' } });

    expect(mockFetch).toHaveBeenCalledTimes(3);

    const [tokenUrl, tokenInit] = mockFetch.mock.calls[0];
    expect(tokenUrl).toBe('https://oauth2.googleapis.com/token');
    const assertion = new URLSearchParams(tokenInit.body).get('assertion') ?? '';
    expect(assertion.split('.')).toHaveLength(3);

    const [pushUrl, pushInit] = mockFetch.mock.calls[1];
    expect(pushUrl).toBe('https://fcm.googleapis.com/v1/projects/test-project/messages:send');
    expect(pushInit.headers.Authorization).toBe('Bearer test-access-token');
    expect(JSON.parse(pushInit.body)).toEqual({
      message: {
        token: 'device-1',
        notification: { title: 'Move your car', body: 'Soon' },
        data: { reminder_id: 'r1' },
      },
    });
  });

  it('surfaces FCM errors', async () => {
    mockFetch.mockImplementation(async (url: string) => {
      if (url === 'https://oauth2.googleapis.com/token') {
        return new Response(JSON.stringify({ access_token: 'test-access-token' }), { status: 200 });
      }
      return new Response('unregistered', { status: 404 });
    });

    const sender = createFcmSender({ serviceAccountJson: JSON.stringify(serviceAccount) });
    await expect(sender.send({ deviceToken: 'device-1', title: 'T', body: 'B', data: {} })).rejects.toThrow(
      'FCM error 404: unregistered',
    );
  });

  it('parses dry run flags', () => {
    expect(shouldDryRun('true')).toBe(true);
    expect(shouldDryRun(' YES ')).toBe(true);
    expect(shouldDryRun('0')).toBe(false);
    expect(shouldDryRun(undefined)).toBe(false);
  });
});
