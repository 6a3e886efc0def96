import { DataModelInterface } from "../../../common/interfaces/datamodel.interface";
import { PhotoSerialiser } from "../serialisers/photo.serialiser";
import { Photo } from "./photo.entity";
import { mapPhoto } from "./photo.map";
import { photoMeta } from "./photo.meta";

export const PhotoModel: DataModelInterface<Photo> = {
  ...photoMeta,
  mapper: mapPhoto,
  serialiser: PhotoSerialiser,
};
