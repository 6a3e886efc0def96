import { Type } from "class-transformer";
import { Equals, IsBoolean, IsDefined, IsInt, IsNotEmpty, IsString, IsUUID, Min, ValidateNested } from "class-validator";
import { catMeta } from "../entities/cat.meta";

export class CatPutAttributesDTO {
  @IsDefined()
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsDefined()
  @IsInt()
  @Min(0)
  age!: number;

  @IsDefined()
  @IsString()
  gender!: string;

  @IsDefined()
  @IsString()
  about!: string;

  @IsDefined()
  @IsBoolean()
  sterilized!: boolean;
}

export class CatPutDataDTO {
  @Equals(catMeta.endpoint)
  type!: string;

  @IsUUID()
  id!: string;

  @ValidateNested()
  @IsNotEmpty()
  @Type(() => CatPutAttributesDTO)
  attributes!: CatPutAttributesDTO;
}

export class CatPutDTO {
  @ValidateNested()
  @IsNotEmpty()
  @Type(() => CatPutDataDTO)
  data!: CatPutDataDTO;
}
