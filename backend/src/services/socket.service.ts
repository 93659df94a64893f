import { Server as SocketServer, type Socket } from 'socket.io';
import type { Server as HTTPServer } from 'http';
import type { SessionService } from './session.service';

export class SocketService {
  private io: SocketServer;
  private detachSession: () => void;

  constructor(httpServer: HTTPServer, private readonly session: SessionService) {
    this.io = new SocketServer(httpServer, {
      cors: {
        origin: '*',
        methods: ['GET', 'POST'],
      },
    });

    this.initializeSocketHandlers();

    // Every state transition is pushed to all control pages
    this.detachSession = session.onChange((snapshot) => {
      this.io.emit('session:updated', snapshot);
    });
  }

  private initializeSocketHandlers(): void {
    this.io.on('connection', (socket: Socket) => {
      console.log(`🔌 Client connected: ${socket.id}`);

      socket.emit('session:updated', this.session.snapshot());

      socket.on('session:request', () => {
        socket.emit('session:updated', this.session.snapshot());
      });

      socket.on('disconnect', () => {
        console.log(`🔌 Client disconnected: ${socket.id}`);
      });
    });
  }

  close(): Promise<void> {
    this.detachSession();
    return new Promise((resolve) => {
      this.io.close(() => resolve());
    });
  }
}

export const initializeSocketService = (httpServer: HTTPServer, session: SessionService): SocketService =>
  new SocketService(httpServer, session);
