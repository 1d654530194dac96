import { InjectionToken } from '@angular/core';
import { environment } from '@env/environment';

export interface GalleryLayoutConfig {
    rowHeightPx: number;
    spacingPx: number;
    masonryColumns: number;
}

export interface ThumbnailConfig {
    maxWorkers: number;
    fetchTimeoutMs: number;
    edgePx: number;
    jpegQuality: number;
}

export interface CacheConfig {
    enabled: boolean;
    defaultTtlMs: number;
    maxItems: number;
}

export interface RateLimitConfig {
    warningThreshold: number;
    criticalThreshold: number;
}

/** Re-encoding applied to a photo before it is committed next to its thumbnail. */
export interface UploadConfig {
    /** Longest edge of the stored thumbnail; the aspect ratio is kept. */
    thumbnailMaxPx: number;
    thumbnailQuality: number;
    originalQuality: number;
}

export interface BuildTrackingConfig {
    maxAttempts: number;
    pollIntervalMs: number;
    initialDelayMs: number;
}

export interface GalleryConfig {
    apiBaseUrl: string;
    organization: string;
    thumbnailDirectory: string;
    authToken: string | null;
    gallery: GalleryLayoutConfig;
    thumbnails: ThumbnailConfig;
    cache: CacheConfig;
    rateLimit: RateLimitConfig;
    upload: UploadConfig;
    buildTracking: BuildTrackingConfig;
}

type SectionKey = 'gallery' | 'thumbnails' | 'cache' | 'rateLimit' | 'upload' | 'buildTracking';

export type GalleryConfigOverrides = Partial<Omit<GalleryConfig, SectionKey>> & {
    [K in SectionKey]?: Partial<GalleryConfig[K]>;
};

export class ConfigValidationError extends Error {
    constructor(readonly problems: readonly string[]) {
        super(`Invalid gallery configuration: ${problems.join('; ')}`);
        this.name = 'ConfigValidationError';
    }
}

export const GALLERY_CONFIG = new InjectionToken<GalleryConfig>('GALLERY_CONFIG');

export function createConfig(overrides: GalleryConfigOverrides = {}): GalleryConfig {
    const config: GalleryConfig = {
        ...environment,
        ...overrides,
        gallery: { ...environment.gallery, ...overrides.gallery },
        thumbnails: { ...environment.thumbnails, ...overrides.thumbnails },
        cache: { ...environment.cache, ...overrides.cache },
        rateLimit: { ...environment.rateLimit, ...overrides.rateLimit },
        upload: { ...environment.upload, ...overrides.upload },
        buildTracking: { ...environment.buildTracking, ...overrides.buildTracking },
    };

    const problems = validateConfig(config);
    if (problems.length > 0) {
        throw new ConfigValidationError(problems);
    }

    return config;
}

export function validateConfig(config: GalleryConfig): string[] {
    const problems: string[] = [];

    const requirePositive = (label: string, value: number) => {
        if (!Number.isFinite(value) || value <= 0) {
            problems.push(`${label} must be a positive number (got ${value})`);
        }
    };
    const requireQuality = (label: string, value: number) => {
        if (!Number.isFinite(value) || value < 1 || value > 100) {
            problems.push(`${label} must be between 1 and 100 (got ${value})`);
        }
    };
    const requireNonNegative = (label: string, value: number) => {
        if (!Number.isFinite(value) || value < 0) {
            problems.push(`${label} must not be negative (got ${value})`);
        }
    };

    if (!config.apiBaseUrl.trim()) {
        problems.push('apiBaseUrl must not be empty');
    }
    if (!config.organization.trim()) {
        problems.push('organization must not be empty');
    }

    requirePositive('gallery.rowHeightPx', config.gallery.rowHeightPx);
    requireNonNegative('gallery.spacingPx', config.gallery.spacingPx);
    requirePositive('gallery.masonryColumns', config.gallery.masonryColumns);

    requirePositive('thumbnails.maxWorkers', config.thumbnails.maxWorkers);
    requirePositive('thumbnails.fetchTimeoutMs', config.thumbnails.fetchTimeoutMs);
    requirePositive('thumbnails.edgePx', config.thumbnails.edgePx);
    requireQuality('thumbnails.jpegQuality', config.thumbnails.jpegQuality);

    // TTLs may be Infinity for entries that never expire.
    if (Number.isNaN(config.cache.defaultTtlMs) || config.cache.defaultTtlMs <= 0) {
        problems.push(`cache.defaultTtlMs must be a positive number (got ${config.cache.defaultTtlMs})`);
    }
    requirePositive('cache.maxItems', config.cache.maxItems);

    requireNonNegative('rateLimit.warningThreshold', config.rateLimit.warningThreshold);
    requireNonNegative('rateLimit.criticalThreshold', config.rateLimit.criticalThreshold);
    if (config.rateLimit.criticalThreshold > config.rateLimit.warningThreshold) {
        problems.push('rateLimit.criticalThreshold must not exceed rateLimit.warningThreshold');
    }

    requirePositive('upload.thumbnailMaxPx', config.upload.thumbnailMaxPx);
    requireQuality('upload.thumbnailQuality', config.upload.thumbnailQuality);
    requireQuality('upload.originalQuality', config.upload.originalQuality);

    requirePositive('buildTracking.maxAttempts', config.buildTracking.maxAttempts);
    requireNonNegative('buildTracking.pollIntervalMs', config.buildTracking.pollIntervalMs);
    requireNonNegative('buildTracking.initialDelayMs', config.buildTracking.initialDelayMs);

    return problems;
}
