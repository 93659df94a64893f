import http from 'http';
import { io as connect, type Socket } from 'socket.io-client';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SessionService } from '../services/session.service';
import { initializeSocketService, type SocketService } from '../services/socket.service';
import type { SessionSnapshot } from '../types/api.types';
import { createFakeCameras, FakeRecorder, listen } from './fakes';

const nextSnapshot = (socket: Socket): Promise<SessionSnapshot> =>
  new Promise((resolve) => socket.once('session:updated', (snapshot: SessionSnapshot) => resolve(snapshot)));

describe('SocketService', () => {
  let server: http.Server;
  let socketService: SocketService;
  let session: SessionService;
  let client: Socket;
  let firstSnapshot: Promise<SessionSnapshot>;

  beforeEach(async () => {
    session = new SessionService(createFakeCameras(), new FakeRecorder(), { outputDir: '/output' });
    server = http.createServer();
    socketService = initializeSocketService(server, session);
    const baseUrl = await listen(server);

    client = connect(baseUrl, { transports: ['websocket'] });
    firstSnapshot = nextSnapshot(client);
  });

  afterEach(async () => {
    client.disconnect();
    await socketService.close();
  });

  it('sends the current session on connect', async () => {
    const snapshot = await firstSnapshot;

    expect(snapshot).toMatchObject({ active: 'wide', recording: false, labels: ['wide', 'narrow'] });
  });

  it('broadcasts camera changes', async () => {
    await firstSnapshot;

    const update = nextSnapshot(client);
    await session.toggleCamera();

    expect((await update).active).toBe('narrow');
  });
});
