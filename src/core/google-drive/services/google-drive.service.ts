import { Injectable } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import axios, { isAxiosError } from "axios";
import { BaseConfigInterface } from "../../../config/interfaces/base.config.interface";
import { AppLoggingService } from "../../logging/services/logging.service";
import { GoogleDriveRequestFailedError, handleGoogleDriveError } from "../errors/google-drive.errors";
import {
  GOOGLE_DRIVE_FOLDER_MIME_TYPE,
  googleDriveFileListSchema,
  googleDriveFileSchema,
  GoogleDriveUpload,
} from "../interfaces/google-drive-file.interface";
import { GoogleCredentialsService } from "./google-credentials.service";

export const GOOGLE_DRIVE_FILES_URL = "https://www.googleapis.com/drive/v3/files";
export const GOOGLE_DRIVE_UPLOAD_URL = "https://www.googleapis.com/upload/drive/v3/files";

/**
 * Escapes a literal for use between single quotes in a Drive search query.
 */
export const escapeDriveQueryValue = (value: string): string => value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");

@Injectable()
export class GoogleDriveService {
  private rootFolder?: Promise<string>;

  constructor(
    private readonly credentials: GoogleCredentialsService,
    private readonly configService: ConfigService<BaseConfigInterface, true>,
    private readonly logger: AppLoggingService,
  ) {}

  private async authorisationHeaders(): Promise<{ Authorization: string }> {
    return { Authorization: `Bearer ${await this.credentials.getAccessToken()}` };
  }

  buildFolderQuery(params: { name: string; parentId?: string }): string {
    const clauses = [
      `mimeType='${GOOGLE_DRIVE_FOLDER_MIME_TYPE}'`,
      `name='${escapeDriveQueryValue(params.name)}'`,
      `trashed=false`,
    ];
    if (params.parentId) clauses.push(`'${escapeDriveQueryValue(params.parentId)}' in parents`);

    return clauses.join(" and ");
  }

  async findFolder(params: { name: string; parentId?: string }): Promise<string | null> {
    const headers = await this.authorisationHeaders();

    try {
      const response = await axios.get(GOOGLE_DRIVE_FILES_URL, {
        headers,
        params: {
          q: this.buildFolderQuery(params),
          fields: "files(id, name)",
          spaces: "drive",
          pageSize: 1,
        },
      });

      const list = googleDriveFileListSchema.parse(response.data);
      return list.files.length > 0 ? list.files[0].id : null;
    } catch (error) {
      handleGoogleDriveError(error);
    }
  }

  async createFolder(params: { name: string; parentId?: string }): Promise<string> {
    const headers = await this.authorisationHeaders();

    try {
      const response = await axios.post(
        GOOGLE_DRIVE_FILES_URL,
        {
          name: params.name,
          mimeType: GOOGLE_DRIVE_FOLDER_MIME_TYPE,
          ...(params.parentId ? { parents: [params.parentId] } : {}),
        },
        { headers, params: { fields: "id" } },
      );

      const folder = googleDriveFileSchema.parse(response.data);
      this.logger.debug(`Created Google Drive folder "${params.name}" (${folder.id})`, GoogleDriveService.name);

      return folder.id;
    } catch (error) {
      handleGoogleDriveError(error);
    }
  }

  /**
   * Finds or creates the folder holding every cat folder. The id is kept for the process lifetime and
   * concurrent callers share one lookup; a failed lookup is forgotten.
   */
  ensureRootFolder(): Promise<string> {
    if (!this.rootFolder) {
      this.rootFolder = this.findOrCreateRootFolder().catch((error: unknown) => {
        this.rootFolder = undefined;
        throw error;
      });
    }

    return this.rootFolder;
  }

  private async findOrCreateRootFolder(): Promise<string> {
    const name = this.configService.get("googleDrive", { infer: true }).rootFolderName;

    return (await this.findFolder({ name })) ?? (await this.createFolder({ name }));
  }

  async createCatFolder(params: { catId: string; catName: string }): Promise<string> {
    const parentId = await this.ensureRootFolder();

    return this.createFolder({ name: `${params.catId} - ${params.catName}`, parentId });
  }

  /**
   * Resumable upload: the metadata request opens a session whose URI receives the bytes.
   */
  async uploadFile(params: GoogleDriveUpload): Promise<string> {
    const headers = await this.authorisationHeaders();

    try {
      const session = await axios.post(
        GOOGLE_DRIVE_UPLOAD_URL,
        { name: params.filename, parents: [params.folderId] },
        {
          headers: {
            ...headers,
            "Content-Type": "application/json; charset=UTF-8",
            "X-Upload-Content-Type": params.contentType,
            "X-Upload-Content-Length": params.buffer.length.toString(),
          },
          params: { uploadType: "resumable" },
        },
      );

      const sessionUri = session.headers["location"];
      if (typeof sessionUri !== "string" || sessionUri.length === 0) {
        throw new GoogleDriveRequestFailedError("no upload session was returned");
      }

      const upload = await axios.put(sessionUri, params.buffer, {
        headers: {
          "Content-Type": params.contentType,
          "Content-Length": params.buffer.length.toString(),
        },
        maxBodyLength: Infinity,
        maxContentLength: Infinity,
      });

      const file = googleDriveFileSchema.parse(upload.data);
      this.logger.debug(`Uploaded "${params.filename}" to Google Drive (${file.id})`, GoogleDriveService.name);

      return file.id;
    } catch (error) {
      handleGoogleDriveError(error);
    }
  }

  /**
   * Deletes a file or a folder with its content. A file that no longer exists is ignored.
   */
  async deleteFile(params: { fileId: string }): Promise<void> {
    const headers = await this.authorisationHeaders();

    try {
      await axios.delete(`${GOOGLE_DRIVE_FILES_URL}/${encodeURIComponent(params.fileId)}`, { headers });
    } catch (error) {
      if (isAxiosError(error) && error.response?.status === 404) {
        this.logger.warn(`Google Drive file ${params.fileId} was already removed`, GoogleDriveService.name);
        return;
      }
      handleGoogleDriveError(error);
    }
  }

  photoUrl(fileId: string): string {
    return `https://drive.google.com/uc?id=${fileId}`;
  }
}
