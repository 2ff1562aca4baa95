import { BadRequestException } from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';

function collectMessages(errors: ValidationError[]): string[] {
  return errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}),
    ...collectMessages(error.children ?? []),
  ]);
}

/**
 * Same contract as a whitelisting ValidationPipe, for commands that do not
 * arrive over HTTP: returns the typed DTO or throws BadRequestException
 * with every constraint message.
 */
export function validateDto<T extends object>(dtoClass: ClassConstructor<T>, input: object): T {
  const dto = plainToInstance(dtoClass, input);
  const errors = validateSync(dto, { whitelist: true, forbidUnknownValues: true });
  if (errors.length > 0) {
    throw new BadRequestException(collectMessages(errors));
  }
  return dto;
}
