export type CameraLabel = string;

export type FrameListener = (frame: Buffer) => void;

/** Live sequence of encoded JPEG frames coming from one physical camera. */
export interface FrameStream {
  onFrame(listener: FrameListener): () => void;
  onError(listener: (error: Error) => void): () => void;
  close(): Promise<void>;
}

export interface CameraSource {
  openCamera(deviceId: string): Promise<FrameStream>;
}

/** Something frames can be read from: a camera pipeline, as seen by the recorder and the stream. */
export interface FrameFeed {
  readonly label: CameraLabel;
  latestJpeg(): Buffer | null;
  subscribe(listener: FrameListener): () => void;
}

export interface Recording {
  readonly label: CameraLabel;
  readonly file: string;
  /** Closes the encoder and remuxes; resolves with the path of the finished file. */
  stop(): Promise<string>;
}

export interface Recorder {
  start(feed: FrameFeed, file: string): Promise<Recording>;
}
