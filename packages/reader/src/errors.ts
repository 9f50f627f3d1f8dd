/**
 * Error types for the annotated log reader.
 *
 * Only LogReadError ever reaches a caller of AnnotatedLogReader.
 * AnnotationDecodeError is raised by codecs and absorbed while scanning.
 */

/**
 * Error thrown when the underlying log stream fails while being read.
 * The reading session is unusable afterwards.
 */
export class LogReadError extends Error {
  readonly buildId: string;

  constructor(buildId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`failed to read log for build ${buildId}: ${reason}`, { cause });
    this.name = "LogReadError";
    this.buildId = buildId;
    Object.setPrototypeOf(this, LogReadError.prototype);
  }
}

/**
 * Error thrown by an annotation codec when a payload is corrupt.
 */
export class AnnotationDecodeError extends Error {
  readonly type: string;

  constructor(type: string, message: string) {
    super(`invalid ${type} annotation: ${message}`);
    this.name = "AnnotationDecodeError";
    this.type = type;
    Object.setPrototypeOf(this, AnnotationDecodeError.prototype);
  }
}
