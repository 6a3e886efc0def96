import * as qs from "qs";
import { JsonApiCursorInterface } from "../interfaces/jsonapi.cursor.interface";
import { JsonApiPaginationInterface } from "../interfaces/jsonapi.pagination.interface";

export type JsonApiQuery = Record<string, unknown>;

const PAGINATION_PARAMS = ["page[size]", "page[offset]", "skip", "limit"];

const toNonNegativeInteger = (value: unknown): number | undefined => {
  if (typeof value !== "string" && typeof value !== "number") return undefined;

  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : undefined;
};

const formatUrl = (url: URL): string =>
  url.toString().replace(/%5B/g, "[").replace(/%5D/g, "]").replace(/%2C/g, ",");

/**
 * Reads `page[size]`/`page[offset]` and their `limit`/`skip` aliases, asks the repository for one row
 * more than the page size and turns the surplus row into a `next` link.
 */
export class JsonApiPaginator {
  private _paginationCount = 20;
  private _pagination: JsonApiPaginationInterface = {
    size: this._paginationCount,
    offset: 0,
    offsetNext: undefined,
    offsetPrevious: undefined,
  };

  constructor(query?: JsonApiQuery) {
    if (!query) return;

    const flatQuery: Record<string, string> = {};
    for (const [key, value] of Object.entries(query)) {
      if (typeof value === "string") flatQuery[key] = value;
      else if (typeof value === "number" || typeof value === "boolean") flatQuery[key] = String(value);
    }

    const parsedQuery = qs.parse(flatQuery);
    const parsedPage = parsedQuery.page;
    const page: qs.ParsedQs =
      parsedPage && typeof parsedPage === "object" && !Array.isArray(parsedPage) ? parsedPage : {};

    const size = toNonNegativeInteger(page.size) ?? toNonNegativeInteger(parsedQuery.limit);
    const offset = toNonNegativeInteger(page.offset) ?? toNonNegativeInteger(parsedQuery.skip);

    if (size !== undefined) this._pagination.size = size;
    if (offset !== undefined) this._pagination.offset = offset;
  }

  generateLinks<T>(data: T[], url: string): { self: string; next?: string; previous?: string } {
    const response: { self: string; next?: string; previous?: string } = {
      self: url,
    };

    this.updatePagination(data);

    const urlSelf = this.pageUrl(url, this._pagination.offset);
    response.self = formatUrl(urlSelf);

    if (data.length >= this.size) {
      if (this._pagination.offsetNext !== undefined) {
        response.next = formatUrl(this.pageUrl(url, this._pagination.offsetNext));
      }

      data.splice(this._pagination.size);
    }

    if (this._pagination.offsetPrevious !== undefined) {
      response.previous = formatUrl(this.pageUrl(url, this._pagination.offsetPrevious));
    }

    return response;
  }

  private pageUrl(url: string, offset: number): URL {
    const pageUrl = new URL(url);
    for (const param of PAGINATION_PARAMS) pageUrl.searchParams.delete(param);

    pageUrl.searchParams.set("page[size]", this._pagination.size.toString());
    if (offset > 0) pageUrl.searchParams.set("page[offset]", offset.toString());

    return pageUrl;
  }

  updatePagination<T>(data: T[]): void {
    // An empty page has no neighbours to step to
    if (this._pagination.size === 0) return;

    const hasEnoughData = data.length >= this.size;

    if (hasEnoughData) this._pagination.offsetNext = this._pagination.offset + this._pagination.size;
    if (this._pagination.offset)
      this._pagination.offsetPrevious = Math.max(0, this._pagination.offset - this._pagination.size);
  }

  get paginationCount(): number {
    return this._paginationCount;
  }

  /** Rows to request: the page size plus one to detect a following page */
  get size(): number {
    return this._pagination.size + 1;
  }

  get pagination(): JsonApiPaginationInterface {
    return this._pagination;
  }

  generateCursor(): JsonApiCursorInterface {
    return {
      cursor: this._pagination.offset,
      take: this.size,
    };
  }
}
