import sharp from 'sharp';
import { logger, EMOJIS } from './logger';

/**
 * Normalises a camera capture before text detection: applies EXIF rotation,
 * fits it inside `maxDimension` square without upscaling and re-encodes as JPEG.
 */
export async function prepareForRecognition(imageBuffer: Buffer, maxDimension: number): Promise<Buffer> {
    const { data, info } = await sharp(imageBuffer)
        .rotate()
        .resize({
            width: maxDimension,
            height: maxDimension,
            fit: 'inside',
            withoutEnlargement: true,
        })
        .jpeg({ quality: 90 })
        .toBuffer({ resolveWithObject: true });

    logger.debug(`${EMOJIS.DEBUG} Prepared ${info.width}x${info.height} image (${data.length} bytes) for recognition`);
    return data;
}
