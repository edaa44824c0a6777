/**
 * Error taxonomy for the mindmap pipeline.
 *
 * Every error is fatal: nothing catches and retries. `main` reports
 * the error name and message, then exits non-zero.
 */

export class MindmapError extends Error {
    public constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** The input document does not exist. */
export class MissingInputError extends MindmapError {
    public readonly path: string;

    public constructor(path: string) {
        super(`Mindmap document not found: ${path}`);
        this.path = path;
    }
}

/** The document text is not valid YAML. */
export class DocumentParseError extends MindmapError {}

/** The document parsed, but its shape is not a mindmap. */
export class SchemaError extends MindmapError {}

/** A color string or lighten factor is malformed. */
export class FormatError extends MindmapError {}

/** The rendering engine failed to produce an output. */
export class RenderError extends MindmapError {}

/** Configuration overrides failed validation. */
export class ConfigError extends MindmapError {
    public readonly issues: readonly string[];

    public constructor(issues: readonly string[]) {
        super(`Invalid mindmap configuration: ${issues.join('; ')}`);
        this.issues = issues;
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error && error.message) {
        return error.message;
    }
    return String(error);
}
