/**
 * Error types for the image edit pipeline
 */

export enum ImageEditErrorCode {
  // Request errors
  NO_FILE_PROVIDED = "NO_FILE_PROVIDED",
  INVALID_FILE_TYPE = "INVALID_FILE_TYPE",
  FILE_TOO_LARGE = "FILE_TOO_LARGE",
  VALIDATION_ERROR = "VALIDATION_ERROR",

  // Pipeline errors
  CONFIGURATION_ERROR = "CONFIGURATION_ERROR",
  NETWORK_ERROR = "NETWORK_ERROR",
  PROTOCOL_ERROR = "PROTOCOL_ERROR",
  UPLOAD_REJECTED = "UPLOAD_REJECTED",
  SUBMISSION_ERROR = "SUBMISSION_ERROR",
  TRANSIENT_POLL_ERROR = "TRANSIENT_POLL_ERROR",
  JOB_FAILED = "JOB_FAILED",
  MALFORMED_RESULT = "MALFORMED_RESULT",
  TIMEOUT = "TIMEOUT",

  // General errors
  UNKNOWN_ERROR = "UNKNOWN_ERROR",
}

/**
 * HTTP status used when an error of the given code reaches the client
 */
export const ErrorStatusCodes: Record<ImageEditErrorCode, number> = {
  [ImageEditErrorCode.NO_FILE_PROVIDED]: 400,
  [ImageEditErrorCode.INVALID_FILE_TYPE]: 400,
  [ImageEditErrorCode.FILE_TOO_LARGE]: 413,
  [ImageEditErrorCode.VALIDATION_ERROR]: 400,

  [ImageEditErrorCode.CONFIGURATION_ERROR]: 500,
  [ImageEditErrorCode.NETWORK_ERROR]: 502,
  [ImageEditErrorCode.PROTOCOL_ERROR]: 502,
  [ImageEditErrorCode.UPLOAD_REJECTED]: 502,
  [ImageEditErrorCode.SUBMISSION_ERROR]: 502,
  [ImageEditErrorCode.TRANSIENT_POLL_ERROR]: 503,
  [ImageEditErrorCode.JOB_FAILED]: 422,
  [ImageEditErrorCode.MALFORMED_RESULT]: 502,
  [ImageEditErrorCode.TIMEOUT]: 504,

  [ImageEditErrorCode.UNKNOWN_ERROR]: 500,
};

export const ErrorMessages: Partial<Record<ImageEditErrorCode, string>> = {
  [ImageEditErrorCode.NO_FILE_PROVIDED]: "Please select an image file to upload.",
  [ImageEditErrorCode.INVALID_FILE_TYPE]:
    "Invalid file type. Please upload a JPEG, PNG, GIF, or WebP image.",
  [ImageEditErrorCode.FILE_TOO_LARGE]: "File is too large. Maximum size is 16MB.",
  [ImageEditErrorCode.VALIDATION_ERROR]:
    "Please fill in all required fields (Key, Prompt, and Image).",
  [ImageEditErrorCode.UNKNOWN_ERROR]: "An unexpected error occurred. Please try again.",
};

export class ImageEditError extends Error {
  public code: ImageEditErrorCode;
  public statusCode: number;
  public details?: string;

  constructor(code: ImageEditErrorCode, message: string, details?: string) {
    super(message);
    this.name = "ImageEditError";
    this.code = code;
    this.statusCode = ErrorStatusCodes[code];
    this.details = details;
  }

  toJSON() {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
        details: this.details || undefined,
      },
    };
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap anything thrown outside the classified paths
 */
export function toImageEditError(error: unknown): ImageEditError {
  if (error instanceof ImageEditError) {
    return error;
  }
  return new ImageEditError(
    ImageEditErrorCode.UNKNOWN_ERROR,
    ErrorMessages[ImageEditErrorCode.UNKNOWN_ERROR] ?? "Unexpected error",
    describeError(error)
  );
}
