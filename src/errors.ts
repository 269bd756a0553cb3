export type OrganizerErrorKind = 'NotFound' | 'PermissionDenied' | 'NotADirectory' | 'Io';

/** Fatal error: the source directory cannot be organized at all. */
export class OrganizerError extends Error {
    readonly kind: OrganizerErrorKind;

    constructor(kind: OrganizerErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'OrganizerError';
        this.kind = kind;
    }
}

export function errorCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function toOrganizerError(error: unknown, dir: string): OrganizerError {
    if (error instanceof OrganizerError) return error;
    switch (errorCode(error)) {
        case 'ENOENT':
            return new OrganizerError('NotFound', `Source directory not found: ${dir}`, { cause: error });
        case 'EACCES':
        case 'EPERM':
            return new OrganizerError('PermissionDenied', `Cannot access source directory: ${dir}`, { cause: error });
        case 'ENOTDIR':
            return new OrganizerError('NotADirectory', `Source path is not a directory: ${dir}`, { cause: error });
        default:
            return new OrganizerError('Io', `Cannot read source directory ${dir}: ${errorMessage(error)}`, { cause: error });
    }
}
