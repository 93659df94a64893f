import http from 'http';
import { createApp } from './app';
import { config } from './config/env.config';
import { createCameraManager } from './services/cameraManager.service';
import { FfmpegCameraSource } from './services/cameraSource.service';
import { FfmpegRecorder } from './services/recorder.service';
import { SessionService } from './services/session.service';
import { initializeSocketService } from './services/socket.service';

const source = new FfmpegCameraSource({
  inputFormat: config.cameras.inputFormat,
  fps: config.cameras.previewFps,
  width: config.cameras.previewWidth,
  height: config.cameras.previewHeight,
  openTimeoutMs: config.cameras.openTimeoutMs,
});

const cameras = createCameraManager(config.cameras.devices, source, {
  openAttempts: config.cameras.openAttempts,
  openRetryDelayMs: config.cameras.openRetryDelayMs,
});

const recorder = new FfmpegRecorder({
  inputFps: config.cameras.previewFps,
  outputFps: config.cameras.recordFps,
});

const session = new SessionService(cameras, recorder, {
  outputDir: config.outputDir,
});

const app = createApp({
  session,
  frameIntervalMs: Math.max(1, Math.round(1000 / config.cameras.previewFps)),
  frontendDist: config.frontendDist,
});
const httpServer = http.createServer(app);

// Initialize Socket.io
const socketService = initializeSocketService(httpServer, session);

const PORT = config.port;

const shutdown = async (signal: string) => {
  console.log(`🛑 ${signal} received, shutting down`);
  try {
    if (session.isRecording()) {
      const file = await session.stopRecording();
      console.log(`🎬 Recording finalized on shutdown: ${file}`);
    }
    await session.stopCameras();
    await socketService.close();
    httpServer.close(() => process.exit(0));
  } catch (error) {
    console.error('❌ Error during shutdown:', error);
    process.exit(1);
  }
};

const startServer = async () => {
  try {
    const { started, failed } = await session.startCameras();
    console.log(`📷 Cameras started: ${started.join(', ') || 'none'}`);
    if (failed.length > 0) {
      console.warn(`⚠️ Cameras unavailable: ${failed.join(', ')}`);
    }

    httpServer.listen(PORT, () => {
      console.log(`🚀 Server is running on http://localhost:${PORT}`);
      console.log(`🎥 Active camera: ${session.active}`);
      console.log(`🔌 Socket.io initialized`);
    });
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
};

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

void startServer();
