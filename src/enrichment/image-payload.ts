import sharp from 'sharp';

export interface ImagePayload {
  dataUrl: string;
  width: number;
  height: number;
  bytes: number;
}

/**
 * Re-encode an image for the vision request: orientation applied, longest
 * edge capped at `maxEdge`, alpha flattened onto white, sRGB JPEG.
 */
export async function prepareImagePayload(imagePath: string, maxEdge: number): Promise<ImagePayload> {
  const { data, info } = await sharp(imagePath)
    .rotate()
    .resize({ width: maxEdge, height: maxEdge, fit: 'inside', withoutEnlargement: true })
    .flatten({ background: '#ffffff' })
    .toColourspace('srgb')
    .jpeg({ quality: 85 })
    .toBuffer({ resolveWithObject: true });

  return {
    dataUrl: `data:image/jpeg;base64,${data.toString('base64')}`,
    width: info.width,
    height: info.height,
    bytes: data.length,
  };
}
