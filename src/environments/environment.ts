export const environment = {
    apiBaseUrl: 'https://api.github.com',
    organization: 'lifetime-memories',
    thumbnailDirectory: 'thumbnails',
    // Read once at startup; the engine never writes it back.
    authToken: process.env['GITHUB_TOKEN'] ?? null,

    gallery: {
        rowHeightPx: 120,
        spacingPx: 6,
        masonryColumns: 6,
    },
    thumbnails: {
        maxWorkers: 8,
        fetchTimeoutMs: 10_000,
        edgePx: 220,
        jpegQuality: 85,
    },
    cache: {
        enabled: true,
        defaultTtlMs: 300_000,
        maxItems: 1000,
    },
    rateLimit: {
        warningThreshold: 100,
        criticalThreshold: 10,
    },
    upload: {
        thumbnailMaxPx: 200,
        thumbnailQuality: 85,
        originalQuality: 95,
    },
    buildTracking: {
        maxAttempts: 60,
        pollIntervalMs: 5_000,
        initialDelayMs: 2_000,
    },
};
