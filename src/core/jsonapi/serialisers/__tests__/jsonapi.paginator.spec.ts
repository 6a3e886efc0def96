import { describe, expect, it } from "vitest";
import { JsonApiPaginator } from "../jsonapi.paginator";

describe("JsonApiPaginator", () => {
  describe("generateCursor", () => {
    it("should default to the first page of 20", () => {
      const paginator = new JsonApiPaginator();

      expect(paginator.generateCursor()).toEqual({ cursor: 0, take: 21 });
    });

    it("should read skip and limit", () => {
      const paginator = new JsonApiPaginator({ skip: "20", limit: "10" });

      expect(paginator.generateCursor()).toEqual({ cursor: 20, take: 11 });
    });

    it("should read page[size] and page[offset] ahead of skip and limit", () => {
      const paginator = new JsonApiPaginator({ "page[size]": "5", "page[offset]": "10", skip: "1", limit: "2" });

      expect(paginator.generateCursor()).toEqual({ cursor: 10, take: 6 });
    });

    it("should ignore values that are not non-negative integers", () => {
      const paginator = new JsonApiPaginator({ skip: "abc", limit: "-1" });

      expect(paginator.generateCursor()).toEqual({ cursor: 0, take: 21 });
    });

    it("should fall back to skip and limit when page is not a keyed object", () => {
      expect(new JsonApiPaginator({ page: "3", limit: "5" }).generateCursor()).toEqual({ cursor: 0, take: 6 });
      expect(new JsonApiPaginator({ "page[]": "7", skip: "2" }).generateCursor()).toEqual({ cursor: 2, take: 21 });
    });

    it("should keep a limit of zero", () => {
      const paginator = new JsonApiPaginator({ limit: "0" });

      expect(paginator.generateCursor()).toEqual({ cursor: 0, take: 1 });
    });

    it("should keep a page size of zero", () => {
      const paginator = new JsonApiPaginator({ "page[size]": "0", "page[offset]": "3" });

      expect(paginator.generateCursor()).toEqual({ cursor: 3, take: 1 });
    });

    it("should not let the client lift the page size", () => {
      const paginator = new JsonApiPaginator({ fetchAll: "true" });

      expect(paginator.generateCursor()).toEqual({ cursor: 0, take: 21 });
    });
  });

  describe("generateLinks", () => {
    it("should link the next and previous pages and trim the surplus row", () => {
      // Arrange
      const paginator = new JsonApiPaginator({ "page[size]": "5", "page[offset]": "10" });
      const data = [1, 2, 3, 4, 5, 6];

      // Act
      const links = paginator.generateLinks(data, "http://localhost:8000/cats/all?page[size]=5&page[offset]=10");

      // Assert
      expect(links).toEqual({
        self: "http://localhost:8000/cats/all?page[size]=5&page[offset]=10",
        next: "http://localhost:8000/cats/all?page[size]=5&page[offset]=15",
        previous: "http://localhost:8000/cats/all?page[size]=5&page[offset]=5",
      });
      expect(data).toEqual([1, 2, 3, 4, 5]);
    });

    it("should not link a next page on the last page", () => {
      const paginator = new JsonApiPaginator();
      const data = [1, 2, 3];

      const links = paginator.generateLinks(data, "http://localhost:8000/cats/all");

      expect(links).toEqual({ self: "http://localhost:8000/cats/all?page[size]=20" });
      expect(data).toEqual([1, 2, 3]);
    });

    it("should rewrite skip and limit into page parameters", () => {
      const paginator = new JsonApiPaginator({ skip: "2", limit: "2" });
      const data = ["a", "b", "c"];

      const links = paginator.generateLinks(data, "http://localhost:8000/cats/all?skip=2&limit=2");

      expect(links).toEqual({
        self: "http://localhost:8000/cats/all?page[size]=2&page[offset]=2",
        next: "http://localhost:8000/cats/all?page[size]=2&page[offset]=4",
        previous: "http://localhost:8000/cats/all?page[size]=2",
      });
      expect(data).toEqual(["a", "b"]);
    });

    it("should return an empty page without neighbours for a limit of zero", () => {
      const paginator = new JsonApiPaginator({ skip: "4", limit: "0" });
      const data = ["a"];

      const links = paginator.generateLinks(data, "http://localhost:8000/cats/all?skip=4&limit=0");

      expect(links).toEqual({ self: "http://localhost:8000/cats/all?page[size]=0&page[offset]=4" });
      expect(data).toEqual([]);
    });

    it("should page normally when fetchAll is sent", () => {
      const paginator = new JsonApiPaginator({ "page[size]": "2", fetchAll: "true" });
      const data = [1, 2, 3];

      const links = paginator.generateLinks(data, "http://localhost:8000/cats/all?page[size]=2&fetchAll=true");

      expect(links).toEqual({
        self: "http://localhost:8000/cats/all?fetchAll=true&page[size]=2",
        next: "http://localhost:8000/cats/all?fetchAll=true&page[size]=2&page[offset]=2",
      });
      expect(data).toEqual([1, 2]);
    });
  });
});
