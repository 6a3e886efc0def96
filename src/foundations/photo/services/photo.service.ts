import { BadRequestException, Injectable } from "@nestjs/common";
import { randomUUID } from "crypto";
import { UploadedFile } from "../../../common/helpers/multipart.reader";
import { GoogleDriveService } from "../../../core/google-drive/services/google-drive.service";
import { AppLoggingService } from "../../../core/logging/services/logging.service";
import { Cat } from "../../cat/entities/cat.entity";
import { PHOTO_CONTENT_TYPES, PHOTO_EXTENSIONS } from "../constants/photo.types";
import { Photo } from "../entities/photo.entity";
import { PhotoRepository } from "../repositories/photo.repository";

const GENERIC_CONTENT_TYPE = "application/octet-stream";

@Injectable()
export class PhotoService {
  constructor(
    private readonly repository: PhotoRepository,
    private readonly googleDrive: GoogleDriveService,
    private readonly logger: AppLoggingService,
  ) {}

  /** The accepted extension the filename ends with, in any case */
  photoExtension(filename: string): string | undefined {
    const lowered = filename.toLowerCase();
    return PHOTO_EXTENSIONS.find((extension) => lowered.endsWith(extension));
  }

  isImage(filename: string): boolean {
    return this.photoExtension(filename) !== undefined;
  }

  /**
   * Rejects the whole batch on the first file that is not a photo.
   */
  validateFiles(files: UploadedFile[]): void {
    const invalid = files.find((file) => !this.isImage(file.filename));

    if (invalid) {
      throw new BadRequestException(
        `File '${invalid.filename}' has an invalid file type. Only image files are allowed.`,
      );
    }
  }

  contentType(file: UploadedFile): string {
    if (file.mimetype && file.mimetype !== GENERIC_CONTENT_TYPE) return file.mimetype;

    const extension = this.photoExtension(file.filename);
    return extension ? PHOTO_CONTENT_TYPES[extension] : GENERIC_CONTENT_TYPE;
  }

  /**
   * Uploads the files one by one into the cat's Drive folder and links a Photo node to the cat for each.
   */
  async uploadForCat(params: { cat: Cat; folderId: string; files: UploadedFile[] }): Promise<Photo[]> {
    this.validateFiles(params.files);

    const photos: Photo[] = [];

    for (const file of params.files) {
      const googleFileId = await this.googleDrive.uploadFile({
        folderId: params.folderId,
        filename: file.filename,
        contentType: this.contentType(file),
        buffer: file.buffer,
      });

      const photo = await this.repository.createForCat({
        catId: params.cat.id,
        id: randomUUID(),
        url: this.googleDrive.photoUrl(googleFileId),
        googleFileId,
        filename: file.filename,
      });

      if (photo) photos.push(photo);
    }

    this.logger.logBusinessEvent("photos_uploaded", {
      catId: params.cat.id,
      folderId: params.folderId,
      count: photos.length,
    });

    return photos;
  }

  /**
   * Removes the cat's photos from Drive: the folder when the cat has one, otherwise each file.
   */
  async deleteForCat(params: { cat: Cat }): Promise<void> {
    if (params.cat.googleFolderId) {
      await this.googleDrive.deleteFile({ fileId: params.cat.googleFolderId });
      return;
    }

    const photos = await this.repository.findByCat({ catId: params.cat.id });
    for (const photo of photos) {
      await this.googleDrive.deleteFile({ fileId: photo.googleFileId });
    }
  }
}
