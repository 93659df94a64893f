const SOI = Buffer.from([0xff, 0xd8]);
const EOI = Buffer.from([0xff, 0xd9]);

/**
 * Cuts a raw MJPEG byte stream (as ffmpeg writes it with `-f mjpeg`) into
 * whole JPEG images. Chunks may end anywhere; the remainder is kept for the
 * next push.
 */
export class JpegFrameSplitter {
  private pending: Buffer = Buffer.alloc(0);

  constructor(private readonly maxPendingBytes = 8 * 1024 * 1024) {}

  push(chunk: Buffer): Buffer[] {
    this.pending = this.pending.length ? Buffer.concat([this.pending, chunk]) : chunk;
    const frames: Buffer[] = [];

    let start = this.pending.indexOf(SOI);
    while (start !== -1) {
      const end = this.pending.indexOf(EOI, start + SOI.length);
      if (end === -1) break;

      frames.push(Buffer.from(this.pending.subarray(start, end + EOI.length)));
      start = this.pending.indexOf(SOI, end + EOI.length);
    }

    if (start === -1) {
      // keep a trailing 0xff, it may be the first half of the next SOI
      this.pending = this.pending.length && this.pending[this.pending.length - 1] === 0xff
        ? Buffer.from([0xff])
        : Buffer.alloc(0);
    } else {
      this.pending = this.pending.subarray(start);
    }

    if (this.pending.length > this.maxPendingBytes) {
      this.pending = Buffer.alloc(0);
    }
    return frames;
  }

  reset(): void {
    this.pending = Buffer.alloc(0);
  }
}
