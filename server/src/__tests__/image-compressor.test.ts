import { describe, it, expect } from 'vitest';
import sharp from 'sharp';
import { sharpCompressor } from '../pipelines/image-compressor.js';

function solidImage(width: number, height: number) {
  return sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 120, b: 40 } },
  }).png().toBuffer();
}

describe('sharpCompressor', () => {
  it('bounds the longer side to 1600 and keeps the aspect ratio', async () => {
    const output = await sharpCompressor(await solidImage(2000, 1000));
    const meta = await sharp(output).metadata();
    expect(meta.format).toBe('jpeg');
    expect([meta.width, meta.height]).toEqual([1600, 800]);
  });

  it('never enlarges small images', async () => {
    const output = await sharpCompressor(await solidImage(300, 400));
    const meta = await sharp(output).metadata();
    expect([meta.width, meta.height]).toEqual([300, 400]);
  });

  it('rejects bytes that are not an image', async () => {
    await expect(sharpCompressor(Buffer.from('not an image'))).rejects.toThrow();
  });
});
