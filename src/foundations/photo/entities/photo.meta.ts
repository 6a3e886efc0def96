import { DataMeta } from "../../../common/interfaces/datamodel.interface";

export const photoMeta: DataMeta = {
  type: "photos",
  endpoint: "photos",
  nodeName: "photo",
  labelName: "Photo",
};
