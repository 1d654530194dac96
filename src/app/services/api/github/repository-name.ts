export class RepositoryNameError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RepositoryNameError';
    }
}

const MAX_LENGTH = 100;
const FORBIDDEN_SEQUENCES = ['..', '~', '^', ':', '\\', '/', '?', '*', '[', ']'];

// Device names Windows refuses as file names, which breaks clones there.
const RESERVED_NAMES: ReadonlySet<string> = new Set([
    'con', 'prn', 'aux', 'nul',
    ...Array.from({ length: 9 }, (_, i) => `com${i + 1}`),
    ...Array.from({ length: 9 }, (_, i) => `lpt${i + 1}`),
]);

/** Returns the trimmed name, or throws {@link RepositoryNameError} describing the first rule it breaks. */
export function validateRepositoryName(name: string): string {
    const trimmed = name.trim();

    if (!trimmed) {
        throw new RepositoryNameError('Repository name cannot be empty');
    }
    if (trimmed.length > MAX_LENGTH) {
        throw new RepositoryNameError(`Repository name must be at most ${MAX_LENGTH} characters`);
    }
    if (!/^[a-z0-9]/i.test(trimmed)) {
        throw new RepositoryNameError('Repository name must start with a letter or number');
    }

    const forbidden = FORBIDDEN_SEQUENCES.find(sequence => trimmed.includes(sequence));
    if (forbidden) {
        throw new RepositoryNameError(`Repository name cannot contain '${forbidden}'`);
    }
    if (RESERVED_NAMES.has(trimmed.toLowerCase())) {
        throw new RepositoryNameError(`'${trimmed}' is a reserved name`);
    }

    return trimmed;
}
