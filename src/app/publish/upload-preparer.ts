import sharp from 'sharp';

import type { UploadConfig } from '@core/config/gallery-config';
import { readImageSize, ThumbnailDecodeError } from '@app/gallery/thumbnail-decoder';
import type { UploadFileRequest } from '@services/api/github/models';
import { validateRepositoryName } from '@services/api/github/repository-name';
import { formatBytes, getFileNameFromPath } from '@shared/utils/utils';

export interface PreparedImage {
    original: Buffer;
    thumbnail: Buffer;
    width: number;
    height: number;
    thumbnailWidth: number;
    thumbnailHeight: number;
}

export interface PreparedUpload {
    fileName: string;
    image: PreparedImage;
    /** Original first, then its thumbnail; commit them in this order. */
    requests: UploadFileRequest[];
}

/**
 * Turns a local photo into the pair of files a gallery repository stores: the photo re-encoded as
 * JPEG at the repository root, and a smaller JPEG of the same name under the thumbnail directory.
 */
export class UploadPreparer {
    constructor(
        private readonly options: UploadConfig,
        private readonly thumbnailDirectory: string,
    ) { }

    async prepareImage(bytes: Uint8Array): Promise<PreparedImage> {
        const { width, height } = await readImageSize(bytes);
        const edgePx = this.options.thumbnailMaxPx;

        try {
            const original = await sharp(bytes).jpeg({ quality: this.options.originalQuality }).toBuffer();
            const { data: thumbnail, info } = await sharp(bytes)
                .resize(edgePx, edgePx, { fit: 'inside', withoutEnlargement: true })
                .jpeg({ quality: this.options.thumbnailQuality })
                .toBuffer({ resolveWithObject: true });

            return { original, thumbnail, width, height, thumbnailWidth: info.width, thumbnailHeight: info.height };
        } catch (error) {
            throw new ThumbnailDecodeError('Failed to re-encode image', { cause: error });
        }
    }

    async prepare(repository: string, sourcePath: string, bytes: Uint8Array): Promise<PreparedUpload> {
        const target = validateRepositoryName(repository);
        const fileName = getFileNameFromPath(sourcePath);
        const image = await this.prepareImage(bytes);
        const thumbnailPath = `${this.thumbnailDirectory}/${fileName}`;

        console.debug(
            `UploadPreparer: ${fileName} ready (original ${formatBytes(image.original.length)}, thumbnail ${formatBytes(image.thumbnail.length)})`,
        );

        return {
            fileName,
            image,
            requests: [
                { repository: target, path: fileName, content: image.original.toString('base64'), message: `Upload ${fileName}` },
                { repository: target, path: thumbnailPath, content: image.thumbnail.toString('base64'), message: `Upload ${thumbnailPath}` },
            ],
        };
    }
}
