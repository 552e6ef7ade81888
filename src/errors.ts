export class StorytellerError extends Error {
  constructor(
    message: string,
    public readonly internalDetails?: string,
  ) {
    super(message);
    this.name = "StorytellerError";
    Object.setPrototypeOf(this, StorytellerError.prototype);
  }
}

/** Missing credential or invalid setting; fatal at startup. */
export class ConfigurationError extends StorytellerError {
  constructor(message: string, internalDetails?: string) {
    super(message, internalDetails);
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/** Non-success or malformed answer from GitHub or OpenAI. */
export class RemoteError extends StorytellerError {
  constructor(
    message: string,
    public readonly status?: number,
    internalDetails?: string,
  ) {
    super(message, internalDetails);
    this.name = "RemoteError";
    Object.setPrototypeOf(this, RemoteError.prototype);
  }
}

export class ImageTransferError extends StorytellerError {
  constructor(
    message: string,
    public readonly retryable: boolean,
    internalDetails?: string,
  ) {
    super(message, internalDetails);
    this.name = "ImageTransferError";
    Object.setPrototypeOf(this, ImageTransferError.prototype);
  }
}

export class UserInputError extends StorytellerError {
  constructor(message: string, internalDetails?: string) {
    super(message, internalDetails);
    this.name = "UserInputError";
    Object.setPrototypeOf(this, UserInputError.prototype);
  }
}

export function extractError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return "Unknown error";
}
