import sharp from 'sharp';

export interface ScaledImage {
  bytes: Buffer;
  width: number;
  height: number;
  /** Dimensions of the image before scaling */
  sourceWidth: number;
  sourceHeight: number;
}

export interface ImageScaler {
  /** Shrinks the image to at most `maxWidth` pixels wide, keeping its aspect ratio. */
  fitWidth(bytes: Buffer, maxWidth: number): Promise<ScaledImage>;
}

export class SharpImageScaler implements ImageScaler {
  async fitWidth(bytes: Buffer, maxWidth: number): Promise<ScaledImage> {
    const metadata = await sharp(bytes).metadata();
    const sourceWidth = metadata.width ?? 0;
    const sourceHeight = metadata.height ?? 0;

    if (sourceWidth > 0 && sourceHeight > 0 && sourceWidth <= maxWidth) {
      return {
        bytes,
        width: sourceWidth,
        height: sourceHeight,
        sourceWidth,
        sourceHeight,
      };
    }

    const { data, info } = await sharp(bytes)
      .resize({ width: maxWidth, withoutEnlargement: true })
      .png()
      .toBuffer({ resolveWithObject: true });

    return {
      bytes: data,
      width: info.width,
      height: info.height,
      sourceWidth: sourceWidth || info.width,
      sourceHeight: sourceHeight || info.height,
    };
  }
}
