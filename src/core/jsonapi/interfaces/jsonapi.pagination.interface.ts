export interface JsonApiPaginationInterface {
  size: number;
  offset: number;
  offsetNext?: number;
  offsetPrevious?: number;
}
