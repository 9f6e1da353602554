export type AppErrorCode =
  | "ACCESS_DENIED"
  | "NAVIGATION_ERROR"
  | "NO_ITEMS_FOUND"
  | "VALIDATION_ERROR"
  | "PROFILE_NOT_FOUND"
  | "TRANSIENT_ELEMENT"
  | "INTERNAL_ERROR";

export type HarvestErrorKind =
  | "AccessDenied"
  | "NavigationError"
  | "NoItemsFound"
  | "ValidationError"
  | "InternalError";

export interface HarvestError {
  kind: HarvestErrorKind;
  message: string;
  context: Record<string, unknown>;
}

export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly retryable: boolean;
  public readonly details: Record<string, unknown> | null;

  public constructor(params: {
    code: AppErrorCode;
    message: string;
    retryable?: boolean;
    details?: Record<string, unknown> | null;
  }) {
    super(params.message);
    this.name = "AppError";
    this.code = params.code;
    this.retryable = params.retryable ?? false;
    this.details = params.details ?? null;
  }
}

export class ValidationError extends AppError {
  public constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: "VALIDATION_ERROR",
      message,
      retryable: false,
      details: details ?? null,
    });
    this.name = "ValidationError";
  }
}

export class ProfileNotFoundError extends AppError {
  public constructor(profileId: string, knownProfiles: string[]) {
    super({
      code: "PROFILE_NOT_FOUND",
      message: `List profile is not registered: ${profileId}`,
      retryable: false,
      details: { profileId, knownProfiles },
    });
    this.name = "ProfileNotFoundError";
  }
}

export class AccessDeniedError extends AppError {
  public constructor(details?: Record<string, unknown>) {
    super({
      code: "ACCESS_DENIED",
      message:
        "Could not access the list view. Make sure the session has permission to view this list.",
      retryable: false,
      details: details ?? null,
    });
    this.name = "AccessDeniedError";
  }
}

export class NoItemsFoundError extends AppError {
  public constructor(details?: Record<string, unknown>) {
    super({
      code: "NO_ITEMS_FOUND",
      message: "No items found. The page may not have loaded properly or the list is empty.",
      retryable: true,
      details: details ?? null,
    });
    this.name = "NoItemsFoundError";
  }
}

export class NavigationError extends AppError {
  public constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: "NAVIGATION_ERROR",
      message,
      retryable: true,
      details: details ?? null,
    });
    this.name = "NavigationError";
  }
}

/**
 * A handle detached between query and use. Drivers throw it; the engine
 * catches it and treats the read as absent.
 */
export class TransientElementError extends AppError {
  public constructor(operation: string, cause?: string) {
    super({
      code: "TRANSIENT_ELEMENT",
      message: `Element is no longer attached (${operation}).`,
      retryable: true,
      details: cause ? { operation, cause } : { operation },
    });
    this.name = "TransientElementError";
  }
}

export const isTransientElementError = (error: unknown): error is TransientElementError =>
  error instanceof TransientElementError;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const normalizeError = (error: unknown): AppError => {
  if (error instanceof AppError) return error;
  if (error instanceof Error) {
    return new AppError({
      code: "INTERNAL_ERROR",
      message: error.message,
      retryable: false,
      details: null,
    });
  }

  return new AppError({
    code: "INTERNAL_ERROR",
    message: "Unknown error.",
    retryable: false,
    details: null,
  });
};

const KIND_BY_CODE: Record<AppErrorCode, HarvestErrorKind> = {
  ACCESS_DENIED: "AccessDenied",
  NAVIGATION_ERROR: "NavigationError",
  NO_ITEMS_FOUND: "NoItemsFound",
  VALIDATION_ERROR: "ValidationError",
  PROFILE_NOT_FOUND: "ValidationError",
  TRANSIENT_ELEMENT: "InternalError",
  INTERNAL_ERROR: "InternalError",
};

export const toHarvestError = (
  error: unknown,
  context: Record<string, unknown> = {},
): HarvestError => {
  const appError = normalizeError(error);
  return {
    kind: KIND_BY_CODE[appError.code],
    message: appError.message,
    context: {
      ...context,
      ...(appError.details ?? {}),
      code: appError.code,
      retryable: appError.retryable,
    },
  };
};
