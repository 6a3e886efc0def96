import { DataModelInterface } from "../../../common/interfaces/datamodel.interface";
import { CatSerialiser } from "../serialisers/cat.serialiser";
import { Cat } from "./cat.entity";
import { mapCat } from "./cat.map";
import { catMeta } from "./cat.meta";

export const CatModel: DataModelInterface<Cat> = {
  ...catMeta,
  mapper: mapCat,
  serialiser: CatSerialiser,
};
