import { BadRequestException, Injectable, InternalServerErrorException, NotFoundException } from "@nestjs/common";
import { randomUUID } from "crypto";
import { UploadedFile } from "../../../common/helpers/multipart.reader";
import { GoogleDriveService } from "../../../core/google-drive/services/google-drive.service";
import { JsonApiListDocument, JsonApiSingleDocument } from "../../../core/jsonapi/interfaces/jsonapi.document.interface";
import { JsonApiPaginator, JsonApiQuery } from "../../../core/jsonapi/serialisers/jsonapi.paginator";
import { JsonApiService } from "../../../core/jsonapi/services/jsonapi.service";
import { AppLoggingService } from "../../../core/logging/services/logging.service";
import { Photo } from "../../photo/entities/photo.entity";
import { PhotoService } from "../../photo/services/photo.service";
import { CatFormDTO } from "../dtos/cat.form.dto";
import { CatPutDataDTO } from "../dtos/cat.put.dto";
import { Cat } from "../entities/cat.entity";
import { CatModel } from "../entities/cat.model";
import { CatRepository } from "../repositories/cat.repository";

@Injectable()
export class CatService {
  private readonly pendingFolders = new Map<string, Promise<string>>();

  constructor(
    private readonly builder: JsonApiService,
    private readonly catRepository: CatRepository,
    private readonly photoService: PhotoService,
    private readonly googleDrive: GoogleDriveService,
    private readonly logger: AppLoggingService,
  ) {}

  async find(params: { query: JsonApiQuery }): Promise<JsonApiListDocument> {
    const paginator = new JsonApiPaginator(params.query);

    return this.builder.buildList(
      CatModel,
      await this.catRepository.findMany({ cursor: paginator.generateCursor() }),
      paginator,
    );
  }

  /**
   * Counts the read as a view; the document carries the incremented counter.
   */
  async findById(params: { catId: string }): Promise<JsonApiSingleDocument> {
    const cat = await this.catRepository.incrementViews({ catId: params.catId });
    if (!cat) throw new NotFoundException("Cat not found");

    return this.builder.buildSingle(CatModel, cat);
  }

  async create(params: { form: CatFormDTO; files: UploadedFile[] }): Promise<JsonApiSingleDocument> {
    this.photoService.validateFiles(params.files);

    const cat = await this.catRepository.create({
      id: randomUUID(),
      name: params.form.name,
      age: params.form.age,
      gender: params.form.gender,
      about: params.form.about,
      sterilized: params.form.sterilized,
    });
    if (!cat) throw new InternalServerErrorException("Cat could not be created");

    let photos: Photo[] = [];
    if (params.files.length > 0) {
      try {
        const folderId = await this.ensureFolder(cat);
        photos = await this.photoService.uploadForCat({ cat, folderId, files: params.files });
      } catch (error) {
        await this.discard(cat);
        throw error;
      }
    }

    this.logger.logBusinessEvent("cat_created", { catId: cat.id, name: cat.name });

    return this.builder.buildSingle(CatModel, { ...cat, photos });
  }

  async addPhotos(params: { catId: string; files: UploadedFile[] }): Promise<{ detail: string }> {
    const cat = await this.catRepository.findById({ catId: params.catId });
    if (!cat) throw new NotFoundException("Cat not found");

    if (params.files.length === 0) throw new BadRequestException("At least one photo is required");
    this.photoService.validateFiles(params.files);

    const folderId = await this.ensureFolder(cat);
    await this.photoService.uploadForCat({ cat, folderId, files: params.files });

    return { detail: "Photos uploaded successfully" };
  }

  async update(params: { catId: string; data: CatPutDataDTO }): Promise<JsonApiSingleDocument> {
    if (params.catId !== params.data.id) {
      throw new BadRequestException("Cat id does not match the {json:api} id");
    }

    const cat = await this.catRepository.update({
      catId: params.catId,
      name: params.data.attributes.name,
      age: params.data.attributes.age,
      gender: params.data.attributes.gender,
      about: params.data.attributes.about,
      sterilized: params.data.attributes.sterilized,
    });
    if (!cat) throw new NotFoundException("Cat not found");

    this.logger.logBusinessEvent("cat_updated", { catId: cat.id });

    return this.builder.buildSingle(CatModel, cat);
  }

  async delete(params: { catId: string }): Promise<{ message: string }> {
    const cat = await this.catRepository.findById({ catId: params.catId });
    if (!cat) throw new NotFoundException("Cat not found");

    await this.photoService.deleteForCat({ cat });
    await this.catRepository.delete({ catId: cat.id });

    this.logger.logBusinessEvent("cat_deleted", { catId: cat.id, photos: cat.photos?.length ?? 0 });

    return { message: `Cat with id:${cat.id} and all related photos deleted successfully` };
  }

  /**
   * Returns the cat's Drive folder, creating it and storing its id on the cat when missing.
   * Concurrent uploads for the same cat wait on a single folder creation.
   */
  private ensureFolder(cat: Cat): Promise<string> {
    if (cat.googleFolderId) return Promise.resolve(cat.googleFolderId);

    const pending = this.pendingFolders.get(cat.id);
    if (pending) return pending;

    const creation = this.createFolder(cat).finally(() => this.pendingFolders.delete(cat.id));
    this.pendingFolders.set(cat.id, creation);

    return creation;
  }

  private async createFolder(cat: Cat): Promise<string> {
    const googleFolderId = await this.googleDrive.createCatFolder({ catId: cat.id, catName: cat.name });
    cat.googleFolderId = googleFolderId;
    await this.catRepository.setFolder({ catId: cat.id, googleFolderId });

    return googleFolderId;
  }

  /**
   * Removes a cat whose photos could not be stored, with whatever already reached Drive.
   */
  private async discard(cat: Cat): Promise<void> {
    try {
      await this.photoService.deleteForCat({ cat });
    } catch (error) {
      this.logger.warn(
        `Could not remove the Drive content of discarded cat ${cat.id}: ${error instanceof Error ? error.message : String(error)}`,
        CatService.name,
      );
    }

    await this.catRepository.delete({ catId: cat.id });
  }
}
