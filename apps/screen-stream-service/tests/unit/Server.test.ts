/**
 * HTTP API and end-to-end stream tests
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import axios from 'axios';
import { fileURLToPath } from 'url';
import { createApp, parseSessionOverrides } from '../../src/server.js';
import { SessionManager } from '../../src/services/session-manager.service.js';
import { StreamBroadcastServer } from '../../src/modules/StreamBroadcastServer.js';
import { ConfigError } from '../../src/types/errors.js';
import { loadConfig } from '../../src/utils/config.js';
import { initLogger } from '../../src/utils/logger.js';
import { FakeProducerProcess, createFakeSpawn, waitFor } from '../helpers/fake-producer.js';
import { listen, MjpegClient, TestServer } from '../helpers/http.js';
import { makeJpegFrame } from '../helpers/jpeg.js';

// Initialize logger for tests
initLogger({
  level: 'error',
  format: 'simple',
  toFile: false,
  toConsole: false,
  logsPath: './test-logs',
});

const publicPath = fileURLToPath(new URL('../../public', import.meta.url));

describe('parseSessionOverrides', () => {
  it('should pick the numeric override fields', () => {
    expect(parseSessionOverrides({ frameRate: 10, quality: 4, other: 'x' })).toEqual({ frameRate: 10, quality: 4 });
  });

  it('should accept an empty or missing body', () => {
    expect(parseSessionOverrides(undefined)).toEqual({});
    expect(parseSessionOverrides({})).toEqual({});
  });

  it('should reject non-numeric values', () => {
    expect(() => parseSessionOverrides({ quality: 'best', scaleWidth: '1280' })).toThrow(ConfigError);
    expect(() => parseSessionOverrides({ quality: 'best' })).toThrow('quality must be a number');
  });
});

describe('Screen stream HTTP API', () => {
  const F1 = makeJpegFrame(100, { fill: 0x11 });
  const F2 = makeJpegFrame(150, { fill: 0x22 });
  const F3 = makeJpegFrame(80, { fill: 0x33 });

  let fakes: ReturnType<typeof createFakeSpawn>;
  let sessionManager: SessionManager;
  let broadcastServer: StreamBroadcastServer;
  let server: TestServer;
  let clients: MjpegClient[];

  const setup = async (factory?: () => FakeProducerProcess): Promise<void> => {
    const config = loadConfig({ SHUTDOWN_TIMEOUT_MS: '200' });
    fakes = createFakeSpawn(factory);
    sessionManager = new SessionManager({ config, spawnFn: fakes.spawnFn, platform: 'linux' });
    broadcastServer = new StreamBroadcastServer({ source: sessionManager, minIntervalMs: 20, idlePollMs: 5 });
    server = await listen(createApp({ sessionManager, broadcastServer, publicPath }));
  };

  const connect = async (): Promise<MjpegClient> => {
    const client = await MjpegClient.connect(`${server.baseUrl}/stream`);
    clients.push(client);
    return client;
  };

  const post = (route: string, body: unknown = {}) =>
    axios.post(`${server.baseUrl}${route}`, body, { validateStatus: () => true });

  beforeEach(() => {
    clients = [];
  });

  afterEach(async () => {
    for (const client of clients) {
      client.close();
    }
    if (sessionManager.isStreaming()) {
      await sessionManager.stopSession();
    }
    await broadcastServer.closeAll();
    await server.close();
  });

  describe('static and health routes', () => {
    beforeEach(async () => {
      await setup();
    });

    it('should serve the viewer page at the root', async () => {
      const response = await axios.get<string>(`${server.baseUrl}/`, { responseType: 'text' });

      expect(response.status).toBe(200);
      expect(response.data).toContain('<img src="/stream" alt="Live screen stream" />');
    });

    it('should report health', async () => {
      const response = await axios.get(`${server.baseUrl}/api/health`);

      expect(response.data).toMatchObject({ status: 'healthy' });
    });

    it('should report an idle session', async () => {
      const response = await axios.get(`${server.baseUrl}/api/session/status`);

      expect(response.data).toMatchObject({ state: 'idle', sessionId: null, uptime: 0, lastError: null });
    });

    it('should answer 503 on /stream while idle', async () => {
      const client = await connect();

      expect(client.status).toBe(503);
    });
  });

  describe('session control', () => {
    beforeEach(async () => {
      await setup();
    });

    it('should start and stop a session', async () => {
      const started = await post('/api/session/start');
      expect(started.status).toBe(200);
      expect(started.data).toMatchObject({ success: true, status: { state: 'streaming' } });

      const stopped = await post('/api/session/stop');
      expect(stopped.status).toBe(200);
      expect(stopped.data).toMatchObject({ success: true, status: { state: 'idle' } });
      expect(fakes.spawned[0].hasExited()).toBe(true);
    });

    it('should answer 409 to a second start', async () => {
      await post('/api/session/start');

      const response = await post('/api/session/start');

      expect(response.status).toBe(409);
      expect(response.data).toMatchObject({ success: false, error: 'A capture session is already active' });
    });

    it('should answer 409 to a stop while idle', async () => {
      const response = await post('/api/session/stop');

      expect(response.status).toBe(409);
      expect(response.data).toMatchObject({ success: false, error: 'No capture session is active' });
    });

    it('should answer 400 to malformed overrides', async () => {
      const response = await post('/api/session/start', { quality: 'best' });

      expect(response.status).toBe(400);
      expect(response.data).toMatchObject({ success: false, error: 'quality must be a number' });
      expect(fakes.calls).toHaveLength(0);
    });

    it('should answer 400 to out-of-range overrides', async () => {
      const response = await post('/api/session/start', { quality: 50 });

      expect(response.status).toBe(400);
      expect(response.data).toMatchObject({ success: false, error: 'CAPTURE_QUALITY must be between 2 and 31' });
    });

    it('should pass overrides through to the producer', async () => {
      await post('/api/session/start', { quality: 12 });

      const { args } = fakes.calls[0];
      expect(args[args.indexOf('-q:v') + 1]).toBe('12');
    });
  });

  describe('launch failure', () => {
    it('should answer 500 and report the error state', async () => {
      await setup(() => new FakeProducerProcess({ launchError: new Error('spawn ffmpeg ENOENT') }));

      const response = await post('/api/session/start');

      expect(response.status).toBe(500);
      expect(response.data).toMatchObject({
        success: false,
        error: 'Failed to launch producer "ffmpeg": spawn ffmpeg ENOENT',
        status: { state: 'error' },
      });
    });
  });

  describe('end to end stream', () => {
    beforeEach(async () => {
      await setup();
      await post('/api/session/start');
    });

    it('should deliver F1, F2 and F3 to a connected viewer in order', async () => {
      const fake = fakes.spawned[0];
      const client = await connect();

      // Three chunks, each completing one frame and starting the next
      const stream = Buffer.concat([F1, F2, F3]);
      fake.writeStdout(stream.subarray(0, 120));
      await client.waitForParts(1);
      fake.writeStdout(stream.subarray(120, 270));
      await client.waitForParts(2);
      fake.writeStdout(stream.subarray(270));
      const parts = await client.waitForParts(3);

      expect(parts).toHaveLength(3);
      expect(parts[0].equals(F1)).toBe(true);
      expect(parts[1].equals(F2)).toBe(true);
      expect(parts[2].equals(F3)).toBe(true);
    });

    it('should give a late viewer the latest frame', async () => {
      const fake = fakes.spawned[0];
      fake.writeStdout(Buffer.concat([F1, F2, F3]));
      await waitFor(() => sessionManager.getStatus().stats.framesCaptured === 3);

      const client = await connect();
      const parts = await client.waitForParts(1);

      expect(parts[0].equals(F3)).toBe(true);
    });

    it('should count connected viewers in the session stats', async () => {
      await connect();
      await connect();

      await waitFor(() => sessionManager.getStatus().stats.subscribers === 2);
      expect(broadcastServer.getSubscriberCount()).toBe(2);
    });

    it('should close viewer connections and the producer on stop', async () => {
      const fake = fakes.spawned[0];
      fake.writeStdout(F1);
      const first = await connect();
      const second = await connect();
      await first.waitForParts(1);

      const response = await post('/api/session/stop');

      expect(response.status).toBe(200);
      expect(fake.hasExited()).toBe(true);
      await first.waitForEnd();
      await second.waitForEnd();
      await waitFor(() => broadcastServer.getSubscriberCount() === 0);
    });
  });
});
