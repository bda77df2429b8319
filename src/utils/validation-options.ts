import {
  BadRequestException,
  HttpStatus,
  ValidationError,
  ValidationPipeOptions,
} from '@nestjs/common';

export type ValidationErrorMap = {
  [property: string]: string | ValidationErrorMap;
};

/**
 * Flatten class-validator errors into { field: "msg, msg" }, nesting for
 * child objects
 */
export function generateErrors(errors: ValidationError[]): ValidationErrorMap {
  return errors.reduce<ValidationErrorMap>(
    (accumulator, currentValue) => ({
      ...accumulator,
      [currentValue.property]:
        (currentValue.children?.length ?? 0) > 0
          ? generateErrors(currentValue.children ?? [])
          : Object.values(currentValue.constraints ?? {}).join(', '),
    }),
    {},
  );
}

// Unknown body/query properties (e.g. a client-supplied hospital id) are
// stripped before they reach a handler.
const validationOptions: ValidationPipeOptions = {
  transform: true,
  whitelist: true,
  errorHttpStatusCode: HttpStatus.BAD_REQUEST,
  exceptionFactory: (errors: ValidationError[]) =>
    new BadRequestException({
      status: HttpStatus.BAD_REQUEST,
      errors: generateErrors(errors),
    }),
};

export default validationOptions;
