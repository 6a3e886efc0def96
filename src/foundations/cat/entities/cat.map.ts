import { mapEntity, toDate } from "../../../common/abstracts/entity";
import { readBoolean, readNullableString, readNumber, readString } from "../../../common/helpers/node.properties";
import { EntityMapperParams } from "../../../common/interfaces/datamodel.interface";
import { photoMeta } from "../../photo/entities/photo.meta";
import { PhotoModel } from "../../photo/entities/photo.model";
import { Cat } from "./cat.entity";

export const mapCat = (params: EntityMapperParams): Cat => {
  return {
    ...mapEntity({ record: params.data }),
    name: readString(params.data, "name"),
    age: readNumber(params.data, "age"),
    gender: readString(params.data, "gender"),
    about: readString(params.data, "about"),
    sterilized: readBoolean(params.data, "sterilized"),
    views: readNumber(params.data, "views"),
    googleFolderId: readNullableString(params.data, "googleFolderId"),
    registeredAt: toDate(params.data.registeredAt),
    photos: params.entityFactory.createChildren({
      model: PhotoModel,
      record: params.record,
      name: `${params.name}_${photoMeta.nodeName}`,
    }),
  };
};
