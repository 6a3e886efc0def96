import { Entity } from "../../../common/abstracts/entity";

export type Photo = Entity & {
  url: string;
  googleFileId: string;
  filename: string;
};
