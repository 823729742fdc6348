/**
 * Raised when a model cannot be configured: unknown language code, missing
 * custom dictionary, invalid options or environment.
 */
export class ConfigurationError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConfigurationError';
    }
}

/**
 * Raised when a dictionary artifact cannot be turned into a usable cost model.
 * `artifactPath` is unset for in-memory word lists.
 */
export class ArtifactError extends ConfigurationError {
    readonly artifactPath: string | undefined;

    constructor(message: string, artifactPath?: string, options?: { cause?: unknown }) {
        super(artifactPath ? `${message} (${artifactPath})` : message, options);
        this.name = 'ArtifactError';
        this.artifactPath = artifactPath;
    }
}
