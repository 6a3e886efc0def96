import { BadRequestException } from "@nestjs/common";
import { Test, TestingModule } from "@nestjs/testing";
import { FastifyReply } from "fastify";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { GoogleDriveController } from "../controllers/google-drive.controller";
import { GoogleCredentialsService } from "../services/google-credentials.service";

describe("GoogleDriveController", () => {
  let controller: GoogleDriveController;

  const mockCredentials = {
    generateAuthorisationUrl: vi.fn(),
    exchangeCode: vi.fn(),
    isConfigured: vi.fn(),
    isAuthorised: vi.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [GoogleDriveController],
      providers: [{ provide: GoogleCredentialsService, useValue: mockCredentials }],
    }).compile();

    controller = module.get<GoogleDriveController>(GoogleDriveController);
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  describe("authorise", () => {
    it("should redirect to the consent screen", async () => {
      mockCredentials.generateAuthorisationUrl.mockResolvedValue("https://accounts.google.com/o/oauth2/auth?client_id=x");
      const reply = { redirect: vi.fn() };

      await controller.authorise(reply as unknown as FastifyReply);

      expect(reply.redirect).toHaveBeenCalledWith("https://accounts.google.com/o/oauth2/auth?client_id=x", 302);
    });
  });

  describe("callback", () => {
    it("should store the token for a valid code", async () => {
      mockCredentials.exchangeCode.mockResolvedValue({});

      const result = await controller.callback("test-code");

      expect(mockCredentials.exchangeCode).toHaveBeenCalledWith("test-code");
      expect(result).toEqual({ detail: "Google Drive authorised" });
    });

    it("should reject a refused consent", async () => {
      await expect(controller.callback(undefined, "access_denied")).rejects.toThrow(
        new BadRequestException("Google Drive authorisation was refused: access_denied"),
      );
      expect(mockCredentials.exchangeCode).not.toHaveBeenCalled();
    });

    it("should reject a callback without a code", async () => {
      await expect(controller.callback()).rejects.toThrow("Missing authorisation code");
    });
  });

  describe("status", () => {
    it("should report configured and authorised", async () => {
      mockCredentials.isConfigured.mockResolvedValue(true);
      mockCredentials.isAuthorised.mockResolvedValue(true);

      expect(await controller.status()).toEqual({ configured: true, authorised: true });
    });

    it("should not look for a token when the credential is missing", async () => {
      mockCredentials.isConfigured.mockResolvedValue(false);

      expect(await controller.status()).toEqual({ configured: false, authorised: false });
      expect(mockCredentials.isAuthorised).not.toHaveBeenCalled();
    });
  });
});
