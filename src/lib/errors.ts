/** Raised when a shape or canvas is asked for with unusable dimensions. */
export class IconGeometryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IconGeometryError';
  }
}

export class IconConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IconConfigError';
  }
}

/**
 * Raised when an image or the manifest cannot be written.
 * `path` is the file or directory the failing operation targeted.
 */
export class IconExportError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(`${message}: ${path}`, options);
    this.name = 'IconExportError';
    this.path = path;
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
