import { Multipart } from "@fastify/multipart";
import { BadRequestException, PayloadTooLargeException } from "@nestjs/common";
import { FastifyRequest } from "fastify";
import { ConfigUploadsInterface } from "../../config/interfaces/config.uploads.interface";

export type UploadedFile = {
  fieldname: string;
  filename: string;
  mimetype: string;
  buffer: Buffer;
};

export type MultipartForm = {
  fields: Record<string, string>;
  files: UploadedFile[];
};

const isPayloadTooLarge = (error: unknown): error is Error =>
  error instanceof Error && "statusCode" in error && error.statusCode === 413;

const fieldValue = (value: unknown): string => (typeof value === "string" ? value : JSON.stringify(value));

/**
 * Buffers every part of a multipart request. A request without a body reads as an empty form.
 * Empty file inputs (no filename, no bytes) are skipped.
 */
export async function readMultipartForm(request: FastifyRequest, limits: ConfigUploadsInterface): Promise<MultipartForm> {
  const form: MultipartForm = { fields: {}, files: [] };

  if (!request.isMultipart()) {
    if (request.body === undefined || request.body === null) return form;
    throw new BadRequestException("Expected a multipart/form-data body");
  }

  const parts: AsyncIterableIterator<Multipart> = request.parts({
    limits: { fileSize: limits.maxFileSize, files: limits.maxFiles },
  });

  try {
    for await (const part of parts) {
      if (part.type === "field") {
        form.fields[part.fieldname] = fieldValue(part.value);
        continue;
      }

      const buffer = await part.toBuffer();
      if (!part.filename && buffer.length === 0) continue;

      form.files.push({
        fieldname: part.fieldname,
        filename: part.filename,
        mimetype: part.mimetype,
        buffer,
      });
    }
  } catch (error) {
    if (isPayloadTooLarge(error)) throw new PayloadTooLargeException(error.message);
    throw error;
  }

  return form;
}
