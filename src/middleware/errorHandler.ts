import { Request, Response, NextFunction } from "express";
import multer from "multer";
import { logger } from "../config/logger";
import { AppError, ImageTooLargeError, ValidationError } from "../errors";
import { monitoringService } from "../services/monitoringService";

/**
 * Translate multer's own errors (file too large, unexpected field, ...) into
 * application errors so they share the failure envelope.
 */
function fromMulterError(err: multer.MulterError): AppError {
  if (err.code === "LIMIT_FILE_SIZE") {
    return new ImageTooLargeError(`Uploaded file "${err.field ?? "file"}" exceeds the maximum file size`);
  }
  return new ValidationError([{ field: err.field ?? "file", message: err.message }], "Invalid upload");
}

/** body-parser reports malformed or oversized JSON with a status and a type. */
function isBodyParserError(err: unknown): err is Error & { status: number; type: string } {
  return (
    err instanceof Error &&
    "status" in err &&
    typeof err.status === "number" &&
    "type" in err &&
    typeof err.type === "string"
  );
}

function fromBodyParserError(err: Error & { status: number; type: string }): AppError {
  if (err.type === "entity.too.large") {
    return new AppError("Request body exceeds the configured size limit", 413, "PAYLOAD_TOO_LARGE", "Request body too large");
  }
  return new ValidationError([{ field: "body", message: err.message }], "Malformed request body");
}

function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  let appError: AppError | null = null;
  if (err instanceof AppError) {
    appError = err;
  } else if (err instanceof multer.MulterError) {
    appError = fromMulterError(err);
  } else if (isBodyParserError(err)) {
    appError = fromBodyParserError(err);
  }

  const statusCode = appError?.statusCode ?? 500;
  const requestId = req.requestId;
  const rawMessage = err instanceof Error ? err.message : String(err);

  monitoringService.recordError();

  if (!appError) {
    logger.error("server", "Unhandled error", {
      requestId,
      statusCode,
      error: rawMessage,
      ...(process.env.NODE_ENV === "development" && err instanceof Error && { stack: err.stack }),
    });

    res.status(500).json({
      success: false,
      error: "Internal server error",
      message: "An unexpected error occurred",
      code: "INTERNAL_ERROR",
      request_id: requestId,
    });
    return;
  }

  logger.warn("server", `${statusCode} - ${appError.message}`, {
    requestId,
    statusCode,
    code: appError.code,
  });

  res.status(statusCode).json({
    success: false,
    error: appError.message,
    message: appError.summary,
    code: appError.code,
    ...(appError instanceof ValidationError && { details: appError.details }),
    request_id: requestId,
  });
}

export { errorHandler };
