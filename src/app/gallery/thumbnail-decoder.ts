import sharp from 'sharp';

import type { ThumbnailConfig } from '@core/config/gallery-config';

import type { DecodedThumbnail } from './gallery.types';

export class ThumbnailDecodeError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ThumbnailDecodeError';
    }
}

export interface SquareRegion {
    left: number;
    top: number;
    side: number;
}

/** Largest square centred in a `width` x `height` image. */
export function centeredSquare(width: number, height: number): SquareRegion {
    const side = Math.min(width, height);
    return {
        left: Math.floor((width - side) / 2),
        top: Math.floor((height - side) / 2),
        side,
    };
}

/** Pixel size of an encoded image; undecodable or zero-size input fails with {@link ThumbnailDecodeError}. */
export async function readImageSize(bytes: Uint8Array): Promise<{ width: number; height: number }> {
    if (bytes.byteLength === 0) {
        throw new ThumbnailDecodeError('Image is empty');
    }

    let metadata: sharp.Metadata;
    try {
        metadata = await sharp(bytes).metadata();
    } catch (error) {
        throw new ThumbnailDecodeError('Unsupported or corrupt image data', { cause: error });
    }

    const { width, height } = metadata;
    if (!width || !height) {
        throw new ThumbnailDecodeError('Image has no dimensions');
    }

    return { width, height };
}

export interface ImageDecoder {
    decode(bytes: Uint8Array): Promise<DecodedThumbnail>;
}

export class ThumbnailDecoder implements ImageDecoder {
    constructor(private readonly options: Pick<ThumbnailConfig, 'edgePx' | 'jpegQuality'>) { }

    async decode(bytes: Uint8Array): Promise<DecodedThumbnail> {
        const { width, height } = await readImageSize(bytes);
        const region = centeredSquare(width, height);
        const edgePx = this.options.edgePx;

        try {
            const data = await sharp(bytes)
                .extract({ left: region.left, top: region.top, width: region.side, height: region.side })
                .resize(edgePx, edgePx)
                .jpeg({ quality: this.options.jpegQuality })
                .toBuffer();

            return { data, width: edgePx, height: edgePx, sourceWidth: width, sourceHeight: height };
        } catch (error) {
            throw new ThumbnailDecodeError('Failed to crop image', { cause: error });
        }
    }
}
