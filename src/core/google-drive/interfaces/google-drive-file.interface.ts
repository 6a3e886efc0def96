import { z } from "zod";

export const GOOGLE_DRIVE_FOLDER_MIME_TYPE = "application/vnd.google-apps.folder";

export const googleDriveFileSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  mimeType: z.string().optional(),
});

export const googleDriveFileListSchema = z.object({
  files: z.array(googleDriveFileSchema).default([]),
});

export type GoogleDriveFile = z.infer<typeof googleDriveFileSchema>;

export type GoogleDriveUpload = {
  folderId: string;
  filename: string;
  contentType: string;
  buffer: Buffer;
};
