import { mapEntity } from "../../../common/abstracts/entity";
import { readString } from "../../../common/helpers/node.properties";
import { EntityMapperParams } from "../../../common/interfaces/datamodel.interface";
import { Photo } from "./photo.entity";

export const mapPhoto = (params: EntityMapperParams): Photo => {
  return {
    ...mapEntity({ record: params.data }),
    url: readString(params.data, "url"),
    googleFileId: readString(params.data, "googleFileId"),
    filename: readString(params.data, "filename"),
  };
};
