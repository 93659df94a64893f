import { describe, expect, it } from 'vitest';
import { JpegFrameSplitter } from '../utils/jpegFrameSplitter';

const jpeg = (...body: number[]) => Buffer.from([0xff, 0xd8, ...body, 0xff, 0xd9]);

describe('JpegFrameSplitter', () => {
  it('returns every complete frame in a chunk', () => {
    const splitter = new JpegFrameSplitter();
    const chunk = Buffer.concat([jpeg(1, 2), jpeg(3)]);

    expect(splitter.push(chunk)).toEqual([jpeg(1, 2), jpeg(3)]);
  });

  it('joins a frame split across chunks', () => {
    const splitter = new JpegFrameSplitter();
    const frame = jpeg(7, 8, 9);

    expect(splitter.push(frame.subarray(0, 3))).toEqual([]);
    expect(splitter.push(frame.subarray(3))).toEqual([frame]);
  });

  it('finds a start marker cut between two chunks', () => {
    const splitter = new JpegFrameSplitter();

    expect(splitter.push(Buffer.from([0x00, 0xff]))).toEqual([]);
    expect(splitter.push(Buffer.from([0xd8, 0x05, 0xff, 0xd9]))).toEqual([jpeg(5)]);
  });

  it('ignores bytes outside of frames', () => {
    const splitter = new JpegFrameSplitter();
    const chunk = Buffer.concat([Buffer.from([0x00, 0x01]), jpeg(4), Buffer.from([0x02])]);

    expect(splitter.push(chunk)).toEqual([jpeg(4)]);
    expect(splitter.push(jpeg(6))).toEqual([jpeg(6)]);
  });

  it('drops a partial frame that grows past the limit', () => {
    const splitter = new JpegFrameSplitter(8);

    expect(splitter.push(Buffer.from([0xff, 0xd8, 1, 2, 3, 4, 5, 6, 7]))).toEqual([]);
    expect(splitter.push(jpeg(1))).toEqual([jpeg(1)]);
  });
});
