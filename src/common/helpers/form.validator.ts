import { BadRequestException } from "@nestjs/common";
import { ClassConstructor, plainToInstance } from "class-transformer";
import { validate, ValidationError } from "class-validator";

const collectMessages = (errors: ValidationError[]): string[] =>
  errors.flatMap((error) => [...Object.values(error.constraints ?? {}), ...collectMessages(error.children ?? [])]);

/**
 * Validates multipart form fields against a DTO, the way the ValidationPipe validates JSON bodies.
 * Fields the DTO does not declare are dropped. A field sent empty counts as not sent, so the DTO default applies.
 */
export async function validateForm<T extends object>(dto: ClassConstructor<T>, fields: Record<string, string>): Promise<T> {
  const filled = Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== ""));
  const instance = plainToInstance(dto, filled);
  const errors = await validate(instance, { whitelist: true });

  if (errors.length > 0) throw new BadRequestException(collectMessages(errors));

  return instance;
}
