import { Test, TestingModule } from "@nestjs/testing";
import { ClsService } from "nestjs-cls";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AppLoggingService } from "../services/logging.service";

describe("AppLoggingService", () => {
  let service: AppLoggingService;

  const mockClsService = {
    isActive: vi.fn(),
    get: vi.fn(),
    set: vi.fn(),
  };

  beforeEach(async () => {
    mockClsService.isActive.mockReturnValue(true);

    const module: TestingModule = await Test.createTestingModule({
      providers: [AppLoggingService, { provide: ClsService, useValue: mockClsService }],
    }).compile();

    service = module.get<AppLoggingService>(AppLoggingService);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.clearAllMocks();
  });

  describe("request context", () => {
    it("should keep the context in the request store", () => {
      const context = { requestId: "req-1", method: "GET", url: "/cats/all" };

      service.setRequestContext(context);

      expect(mockClsService.set).toHaveBeenCalledWith("logContext", context);
    });

    it("should read the context back from the request store", () => {
      mockClsService.get.mockReturnValue({ requestId: "req-1" });

      expect(service.getRequestContext()).toEqual({ requestId: "req-1" });
      expect(mockClsService.get).toHaveBeenCalledWith("logContext");
    });

    it("should clear the context", () => {
      service.clearRequestContext();

      expect(mockClsService.set).toHaveBeenCalledWith("logContext", undefined);
    });

    it("should ignore the store outside a request", () => {
      mockClsService.isActive.mockReturnValue(false);

      service.setRequestContext({ requestId: "req-1" });

      expect(service.getRequestContext()).toBeUndefined();
      expect(mockClsService.set).not.toHaveBeenCalled();
      expect(mockClsService.get).not.toHaveBeenCalled();
    });
  });

  describe("logBusinessEvent", () => {
    it("should log the event under the BUSINESS context", () => {
      const logWithContext = vi.spyOn(service, "logWithContext");

      service.logBusinessEvent("cat_created", { catId: "cat-1", name: "Tom" });

      expect(logWithContext).toHaveBeenCalledWith("Business Event: cat_created", "BUSINESS", {
        catId: "cat-1",
        name: "Tom",
      });
    });
  });

  describe("logHttpRequest", () => {
    it("should log the method, url, status and timing", () => {
      const logWithContext = vi.spyOn(service, "logWithContext");

      service.logHttpRequest("GET", "/cats/all", 200, 12, "127.0.0.1");

      expect(logWithContext).toHaveBeenCalledWith("GET /cats/all - 200 (12ms)", "HTTP", {
        httpMethod: "GET",
        httpUrl: "/cats/all",
        httpStatusCode: 200,
        responseTimeMs: 12,
        clientIp: "127.0.0.1",
      });
    });
  });

  it("should only expose the application logger", () => {
    expect("createChildLogger" in service).toBe(false);
  });
});
