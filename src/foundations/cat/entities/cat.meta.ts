import { DataMeta } from "../../../common/interfaces/datamodel.interface";

export const catMeta: DataMeta = {
  type: "cats",
  endpoint: "cats",
  nodeName: "cat",
  labelName: "Cat",
};
