import { ApiPropertyOptional } from "@nestjs/swagger";
import { Transform, TransformFnParams } from "class-transformer";
import { IsBoolean, IsInt, IsNotEmpty, IsString, Min } from "class-validator";

export const CAT_FORM_DEFAULTS = {
  name: "Cat destroyer",
  age: 3,
  gender: "male",
  about: "about",
  sterilized: true,
} as const;

const toInteger = ({ value }: TransformFnParams): unknown =>
  typeof value === "string" && /^-?\d+$/.test(value.trim()) ? Number(value) : value;

const toBoolean = ({ value }: TransformFnParams): unknown => {
  if (typeof value !== "string") return value;

  const normalised = value.trim().toLowerCase();
  if (normalised === "true") return true;
  if (normalised === "false") return false;
  return value;
};

/**
 * Text fields of the multipart form that creates a cat. Missing fields take their default.
 */
export class CatFormDTO {
  @ApiPropertyOptional({ default: CAT_FORM_DEFAULTS.name })
  @IsString()
  @IsNotEmpty()
  name: string = CAT_FORM_DEFAULTS.name;

  @ApiPropertyOptional({ default: CAT_FORM_DEFAULTS.age, minimum: 0 })
  @Transform(toInteger)
  @IsInt()
  @Min(0)
  age: number = CAT_FORM_DEFAULTS.age;

  @ApiPropertyOptional({ default: CAT_FORM_DEFAULTS.gender })
  @IsString()
  gender: string = CAT_FORM_DEFAULTS.gender;

  @ApiPropertyOptional({ default: CAT_FORM_DEFAULTS.about })
  @IsString()
  about: string = CAT_FORM_DEFAULTS.about;

  @ApiPropertyOptional({ default: CAT_FORM_DEFAULTS.sterilized })
  @Transform(toBoolean)
  @IsBoolean()
  sterilized: boolean = CAT_FORM_DEFAULTS.sterilized;
}
