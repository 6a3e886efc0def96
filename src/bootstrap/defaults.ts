import { FastifyMultipartOptions } from "@fastify/multipart";
import { ConfigUploadsInterface } from "../config/interfaces/config.uploads.interface";

/**
 * Standard FastifyAdapter options for the API
 */
export const defaultFastifyOptions = {
  routerOptions: {
    ignoreTrailingSlash: true,
  },
  bodyLimit: 10 * 1024 * 1024, // 10MB
};

/**
 * Multipart options for photo uploads; the per-file size and file count come from the uploads config
 */
export const multipartOptions = (uploads: ConfigUploadsInterface): FastifyMultipartOptions => ({
  limits: {
    fileSize: uploads.maxFileSize,
    fieldSize: 1024 * 1024, // 1MB
    files: uploads.maxFiles,
    fields: 20,
  },
  attachFieldsToBody: false,
});
