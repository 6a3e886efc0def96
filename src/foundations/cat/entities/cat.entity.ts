import { Entity } from "../../../common/abstracts/entity";
import { Photo } from "../../photo/entities/photo.entity";

export type Cat = Entity & {
  name: string;
  age: number;
  gender: string;
  about: string;
  sterilized: boolean;
  views: number;
  googleFolderId: string | null;
  registeredAt: Date;

  photos?: Photo[];
};
