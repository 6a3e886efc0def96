import { BadRequestException, NotFoundException } from "@nestjs/common";
import { Test, TestingModule } from "@nestjs/testing";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { UploadedFile } from "../../../../common/helpers/multipart.reader";
import { GoogleDriveService } from "../../../../core/google-drive/services/google-drive.service";
import { JsonApiPaginator } from "../../../../core/jsonapi/serialisers/jsonapi.paginator";
import { JsonApiService } from "../../../../core/jsonapi/services/jsonapi.service";
import { GoogleDriveNotAuthorisedError, GoogleDriveRequestFailedError } from "../../../../core/google-drive/errors/google-drive.errors";
import { AppLoggingService } from "../../../../core/logging/services/logging.service";
import { createCat, createPhoto, TEST_IDS } from "../../../../test/fixtures";
import { PhotoService } from "../../../photo/services/photo.service";
import { CatFormDTO } from "../../dtos/cat.form.dto";
import { CatModel } from "../../entities/cat.model";
import { CatRepository } from "../../repositories/cat.repository";
import { CatService } from "../cat.service";

const upload = (filename: string): UploadedFile => ({
  fieldname: "files",
  filename,
  mimetype: "image/jpeg",
  buffer: Buffer.from(filename),
});

describe("CatService", () => {
  let service: CatService;

  const DOCUMENT = { links: { self: "http://localhost:8000/cats" }, data: [] };

  const mockBuilder = {
    buildSingle: vi.fn(),
    buildList: vi.fn(),
  };

  const mockRepository = {
    findMany: vi.fn(),
    findById: vi.fn(),
    incrementViews: vi.fn(),
    create: vi.fn(),
    setFolder: vi.fn(),
    update: vi.fn(),
    delete: vi.fn(),
  };

  const mockPhotoService = {
    validateFiles: vi.fn(),
    uploadForCat: vi.fn(),
    deleteForCat: vi.fn(),
  };

  const mockGoogleDrive = {
    createCatFolder: vi.fn(),
  };

  const mockLogger = {
    logBusinessEvent: vi.fn(),
    warn: vi.fn(),
  };

  const form = (): CatFormDTO => Object.assign(new CatFormDTO(), { name: "Tom", age: 4 });

  beforeEach(async () => {
    mockBuilder.buildSingle.mockResolvedValue(DOCUMENT);
    mockBuilder.buildList.mockResolvedValue(DOCUMENT);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CatService,
        { provide: JsonApiService, useValue: mockBuilder },
        { provide: CatRepository, useValue: mockRepository },
        { provide: PhotoService, useValue: mockPhotoService },
        { provide: GoogleDriveService, useValue: mockGoogleDrive },
        { provide: AppLoggingService, useValue: mockLogger },
      ],
    }).compile();

    service = module.get<CatService>(CatService);
  });

  afterEach(() => {
    vi.resetAllMocks();
  });

  describe("find", () => {
    it("should page with skip and limit and ask for one extra row", async () => {
      // Arrange
      const cats = [createCat()];
      mockRepository.findMany.mockResolvedValue(cats);

      // Act
      const result = await service.find({ query: { skip: "20", limit: "10" } });

      // Assert
      expect(mockRepository.findMany).toHaveBeenCalledWith({ cursor: { cursor: 20, take: 11 } });
      expect(mockBuilder.buildList).toHaveBeenCalledWith(CatModel, cats, expect.any(JsonApiPaginator));
      expect(result).toBe(DOCUMENT);
    });

    it("should default to the first 20 cats", async () => {
      mockRepository.findMany.mockResolvedValue([]);

      await service.find({ query: {} });

      expect(mockRepository.findMany).toHaveBeenCalledWith({ cursor: { cursor: 0, take: 21 } });
    });
  });

  describe("findById", () => {
    it("should count the view and return the cat", async () => {
      const cat = createCat({ views: 3, photos: [createPhoto()] });
      mockRepository.incrementViews.mockResolvedValue(cat);

      await service.findById({ catId: TEST_IDS.catId });

      expect(mockRepository.incrementViews).toHaveBeenCalledWith({ catId: TEST_IDS.catId });
      expect(mockBuilder.buildSingle).toHaveBeenCalledWith(CatModel, cat);
    });

    it("should answer 404 for a missing cat", async () => {
      mockRepository.incrementViews.mockResolvedValue(null);

      await expect(service.findById({ catId: TEST_IDS.catId })).rejects.toThrow(new NotFoundException("Cat not found"));
    });
  });

  describe("create", () => {
    it("should create a cat without touching Drive when no files are sent", async () => {
      // Arrange
      const cat = createCat({ googleFolderId: null });
      mockRepository.create.mockResolvedValue(cat);

      // Act
      await service.create({ form: form(), files: [] });

      // Assert
      expect(mockRepository.create).toHaveBeenCalledWith({
        id: expect.stringMatching(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/),
        name: "Tom",
        age: 4,
        gender: "male",
        about: "about",
        sterilized: true,
      });
      expect(mockGoogleDrive.createCatFolder).not.toHaveBeenCalled();
      expect(mockPhotoService.uploadForCat).not.toHaveBeenCalled();
      expect(mockBuilder.buildSingle).toHaveBeenCalledWith(CatModel, { ...cat, photos: [] });
      expect(mockLogger.logBusinessEvent).toHaveBeenCalledWith("cat_created", { catId: TEST_IDS.catId, name: "Tom" });
    });

    it("should create the cat folder and upload the photos", async () => {
      // Arrange
      const files = [upload("tom.jpg")];
      const photos = [createPhoto()];
      mockRepository.create.mockResolvedValue(createCat({ googleFolderId: null }));
      mockGoogleDrive.createCatFolder.mockResolvedValue("folder-9");
      mockPhotoService.uploadForCat.mockResolvedValue(photos);

      // Act
      await service.create({ form: form(), files });

      // Assert
      expect(mockGoogleDrive.createCatFolder).toHaveBeenCalledWith({ catId: TEST_IDS.catId, catName: "Tom" });
      expect(mockRepository.setFolder).toHaveBeenCalledWith({ catId: TEST_IDS.catId, googleFolderId: "folder-9" });
      expect(mockPhotoService.uploadForCat).toHaveBeenCalledWith({
        cat: expect.objectContaining({ id: TEST_IDS.catId, googleFolderId: "folder-9" }),
        folderId: "folder-9",
        files,
      });
      expect(mockBuilder.buildSingle).toHaveBeenCalledWith(
        CatModel,
        expect.objectContaining({ googleFolderId: "folder-9", photos }),
      );
    });

    it("should check the file types before writing anything", async () => {
      mockPhotoService.validateFiles.mockImplementation(() => {
        throw new BadRequestException("File 'cv.pdf' has an invalid file type. Only image files are allowed.");
      });

      await expect(service.create({ form: form(), files: [upload("cv.pdf")] })).rejects.toThrow(BadRequestException);
      expect(mockRepository.create).not.toHaveBeenCalled();
      expect(mockGoogleDrive.createCatFolder).not.toHaveBeenCalled();
    });

    it("should remove the new cat when Drive is not authorised", async () => {
      // Arrange
      const cat = createCat({ googleFolderId: null });
      mockRepository.create.mockResolvedValue(cat);
      mockGoogleDrive.createCatFolder.mockRejectedValue(new GoogleDriveNotAuthorisedError());

      // Act
      await expect(service.create({ form: form(), files: [upload("tom.jpg")] })).rejects.toBeInstanceOf(
        GoogleDriveNotAuthorisedError,
      );

      // Assert
      expect(mockPhotoService.deleteForCat).toHaveBeenCalledWith({ cat });
      expect(mockRepository.delete).toHaveBeenCalledWith({ catId: TEST_IDS.catId });
      expect(mockRepository.setFolder).not.toHaveBeenCalled();
      expect(mockLogger.logBusinessEvent).not.toHaveBeenCalled();
    });

    it("should remove the new cat and its folder when an upload fails", async () => {
      // Arrange
      mockRepository.create.mockResolvedValue(createCat({ googleFolderId: null }));
      mockGoogleDrive.createCatFolder.mockResolvedValue("folder-9");
      mockPhotoService.uploadForCat.mockRejectedValue(new GoogleDriveRequestFailedError("Backend Error"));

      // Act
      await expect(service.create({ form: form(), files: [upload("tom.jpg")] })).rejects.toBeInstanceOf(
        GoogleDriveRequestFailedError,
      );

      // Assert
      expect(mockPhotoService.deleteForCat).toHaveBeenCalledWith({
        cat: expect.objectContaining({ id: TEST_IDS.catId, googleFolderId: "folder-9" }),
      });
      expect(mockRepository.delete).toHaveBeenCalledWith({ catId: TEST_IDS.catId });
    });

    it("should still remove the new cat when the Drive cleanup fails", async () => {
      mockRepository.create.mockResolvedValue(createCat({ googleFolderId: null }));
      mockGoogleDrive.createCatFolder.mockResolvedValue("folder-9");
      mockPhotoService.uploadForCat.mockRejectedValue(new GoogleDriveRequestFailedError("Backend Error"));
      mockPhotoService.deleteForCat.mockRejectedValue(new Error("Drive unavailable"));

      await expect(service.create({ form: form(), files: [upload("tom.jpg")] })).rejects.toBeInstanceOf(
        GoogleDriveRequestFailedError,
      );

      expect(mockRepository.delete).toHaveBeenCalledWith({ catId: TEST_IDS.catId });
      expect(mockLogger.warn).toHaveBeenCalledWith(
        `Could not remove the Drive content of discarded cat ${TEST_IDS.catId}: Drive unavailable`,
        "CatService",
      );
    });
  });

  describe("addPhotos", () => {
    it("should upload into the existing folder", async () => {
      const cat = createCat();
      const files = [upload("tom.jpg"), upload("tom-2.jpg")];
      mockRepository.findById.mockResolvedValue(cat);
      mockPhotoService.uploadForCat.mockResolvedValue([]);

      const result = await service.addPhotos({ catId: TEST_IDS.catId, files });

      expect(mockGoogleDrive.createCatFolder).not.toHaveBeenCalled();
      expect(mockPhotoService.uploadForCat).toHaveBeenCalledWith({ cat, folderId: "folder-1", files });
      expect(result).toEqual({ detail: "Photos uploaded successfully" });
    });

    it("should create a folder for a cat that has none", async () => {
      mockRepository.findById.mockResolvedValue(createCat({ googleFolderId: null }));
      mockGoogleDrive.createCatFolder.mockResolvedValue("folder-9");
      mockPhotoService.uploadForCat.mockResolvedValue([]);

      await service.addPhotos({ catId: TEST_IDS.catId, files: [upload("tom.jpg")] });

      expect(mockRepository.setFolder).toHaveBeenCalledWith({ catId: TEST_IDS.catId, googleFolderId: "folder-9" });
      expect(mockPhotoService.uploadForCat).toHaveBeenCalledWith(expect.objectContaining({ folderId: "folder-9" }));
    });

    it("should create a single folder for concurrent uploads", async () => {
      // Arrange
      mockRepository.findById.mockImplementation(async () => createCat({ googleFolderId: null }));
      mockGoogleDrive.createCatFolder.mockResolvedValue("folder-9");
      mockPhotoService.uploadForCat.mockResolvedValue([]);

      // Act
      await Promise.all([
        service.addPhotos({ catId: TEST_IDS.catId, files: [upload("tom.jpg")] }),
        service.addPhotos({ catId: TEST_IDS.catId, files: [upload("tom-2.jpg")] }),
      ]);

      // Assert
      expect(mockGoogleDrive.createCatFolder).toHaveBeenCalledTimes(1);
      expect(mockRepository.setFolder).toHaveBeenCalledTimes(1);
      expect(mockPhotoService.uploadForCat).toHaveBeenCalledTimes(2);
      expect(mockPhotoService.uploadForCat).toHaveBeenNthCalledWith(2, expect.objectContaining({ folderId: "folder-9" }));
    });

    it("should require at least one photo", async () => {
      mockRepository.findById.mockResolvedValue(createCat());

      await expect(service.addPhotos({ catId: TEST_IDS.catId, files: [] })).rejects.toThrow(
        new BadRequestException("At least one photo is required"),
      );
    });

    it("should answer 404 for a missing cat", async () => {
      mockRepository.findById.mockResolvedValue(null);

      await expect(service.addPhotos({ catId: TEST_IDS.catId, files: [upload("tom.jpg")] })).rejects.toThrow(
        NotFoundException,
      );
      expect(mockPhotoService.uploadForCat).not.toHaveBeenCalled();
    });
  });

  describe("update", () => {
    const data = {
      type: "cats",
      id: TEST_IDS.catId,
      attributes: { name: "Tim", age: 5, gender: "male", about: "Calmer now", sterilized: true },
    };

    it("should replace the fields and return the cat", async () => {
      const cat = createCat({ name: "Tim", age: 5, about: "Calmer now" });
      mockRepository.update.mockResolvedValue(cat);

      await service.update({ catId: TEST_IDS.catId, data });

      expect(mockRepository.update).toHaveBeenCalledWith({ catId: TEST_IDS.catId, ...data.attributes });
      expect(mockBuilder.buildSingle).toHaveBeenCalledWith(CatModel, cat);
      expect(mockLogger.logBusinessEvent).toHaveBeenCalledWith("cat_updated", { catId: TEST_IDS.catId });
    });

    it("should reject a body for another cat", async () => {
      await expect(service.update({ catId: TEST_IDS.otherCatId, data })).rejects.toThrow(
        new BadRequestException("Cat id does not match the {json:api} id"),
      );
      expect(mockRepository.update).not.toHaveBeenCalled();
    });

    it("should answer 404 for a missing cat", async () => {
      mockRepository.update.mockResolvedValue(null);

      await expect(service.update({ catId: TEST_IDS.catId, data })).rejects.toThrow("Cat not found");
    });
  });

  describe("delete", () => {
    it("should remove the Drive content and then the cat", async () => {
      const cat = createCat({ photos: [createPhoto()] });
      mockRepository.findById.mockResolvedValue(cat);

      const result = await service.delete({ catId: TEST_IDS.catId });

      expect(mockPhotoService.deleteForCat).toHaveBeenCalledWith({ cat });
      expect(mockRepository.delete).toHaveBeenCalledWith({ catId: TEST_IDS.catId });
      expect(mockPhotoService.deleteForCat.mock.invocationCallOrder[0]).toBeLessThan(
        mockRepository.delete.mock.invocationCallOrder[0],
      );
      expect(result).toEqual({
        message: `Cat with id:${TEST_IDS.catId} and all related photos deleted successfully`,
      });
      expect(mockLogger.logBusinessEvent).toHaveBeenCalledWith("cat_deleted", { catId: TEST_IDS.catId, photos: 1 });
    });

    it("should answer 404 for a missing cat", async () => {
      mockRepository.findById.mockResolvedValue(null);

      await expect(service.delete({ catId: TEST_IDS.catId })).rejects.toThrow(NotFoundException);
      expect(mockRepository.delete).not.toHaveBeenCalled();
    });
  });
});
