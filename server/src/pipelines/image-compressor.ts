import sharp from 'sharp';

export type ImageCompressor = (input: string | Buffer) => Promise<Buffer>;

export const COMPRESSED_MAX_DIMENSION = 1600;
export const COMPRESSED_JPEG_QUALITY = 80;

/**
 * JPEG derivative bounded to 1600×1600, aspect ratio kept, never enlarged.
 * EXIF orientation is applied before resizing.
 */
export const sharpCompressor: ImageCompressor = async (input) => {
  return sharp(input)
    .rotate()
    .resize({
      width: COMPRESSED_MAX_DIMENSION,
      height: COMPRESSED_MAX_DIMENSION,
      fit: 'inside',
      withoutEnlargement: true,
    })
    .jpeg({ quality: COMPRESSED_JPEG_QUALITY })
    .toBuffer();
};
