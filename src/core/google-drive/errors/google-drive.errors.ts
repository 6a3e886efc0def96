import { HttpException, HttpStatus } from "@nestjs/common";
import { isAxiosError } from "axios";
import { z } from "zod";

export class GoogleDriveError extends HttpException {
  public readonly reason?: string;

  constructor(message: string, status: HttpStatus, reason?: string) {
    super({ message, reason }, status);
    this.reason = reason;
  }
}

export class GoogleDriveNotConfiguredError extends GoogleDriveError {
  constructor(reason: string) {
    super(`Google Drive is not configured: ${reason}`, HttpStatus.SERVICE_UNAVAILABLE, reason);
  }
}

export class GoogleDriveNotAuthorisedError extends GoogleDriveError {
  constructor() {
    super(
      "Google Drive is not authorised. Visit /google-drive/authorise to grant access",
      HttpStatus.SERVICE_UNAVAILABLE,
    );
  }
}

export class GoogleDriveRequestFailedError extends GoogleDriveError {
  constructor(reason: string) {
    super(`Google Drive request failed: ${reason}`, HttpStatus.BAD_GATEWAY, reason);
  }
}

const googleErrorBodySchema = z.object({
  error: z.union([z.string(), z.object({ message: z.string() })]),
  error_description: z.string().optional(),
});

/**
 * Reads the reason out of a Drive API or OAuth endpoint error body.
 */
export function describeGoogleError(body: unknown): string | undefined {
  const parsed = googleErrorBodySchema.safeParse(body);
  if (!parsed.success) return undefined;

  const { error, error_description } = parsed.data;
  if (typeof error !== "string") return error.message;
  return error_description ? `${error}: ${error_description}` : error;
}

export function handleGoogleDriveError(error: unknown): never {
  if (error instanceof GoogleDriveError) throw error;

  if (isAxiosError(error)) {
    const reason = describeGoogleError(error.response?.data) ?? error.message;
    throw new GoogleDriveRequestFailedError(reason);
  }

  throw new GoogleDriveRequestFailedError(error instanceof Error ? error.message : String(error));
}
