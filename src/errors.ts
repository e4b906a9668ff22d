export class ReviewCascadeError extends Error {
  constructor(
    message: string,
    public cause?: unknown,
  ) {
    super(message);
    this.name = "ReviewCascadeError";
  }
}

/** Something the caller referenced does not exist. */
export class NotFoundError extends ReviewCascadeError {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class ReviewStateNotFoundError extends NotFoundError {
  constructor(
    public readonly prId: number,
    public readonly filePath: string,
  ) {
    super(`Review state not found for PR ${prId}: ${filePath}`);
    this.name = "ReviewStateNotFoundError";
  }
}

export class FileNotInStateError extends NotFoundError {
  constructor(public readonly path: string) {
    super(`File not found in review state: ${path}`);
    this.name = "FileNotInStateError";
  }
}

export class FolderNotInStateError extends NotFoundError {
  constructor(public readonly folder: string) {
    super(`Folder not found in review state: ${folder}`);
    this.name = "FolderNotInStateError";
  }
}

export class InvalidStatusError extends ReviewCascadeError {
  constructor(public readonly value: unknown) {
    super(`Invalid review status: ${JSON.stringify(value)} (expected unreviewed, in-progress, approved or needs-work)`);
    this.name = "InvalidStatusError";
  }
}

export class ReviewStateFormatError extends ReviewCascadeError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ReviewStateFormatError";
  }
}

export class ThreadApiError extends ReviewCascadeError {
  constructor(
    message: string,
    public readonly statusCode: number | null,
    public readonly body: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ThreadApiError";
  }
}
