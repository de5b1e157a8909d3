import { BadRequestException, ValidationPipe, ValidationError as ClassValidationError } from '@nestjs/common';
import { HttpExceptionResponse, ValidationError } from '../interfaces/http-exception.interface';

export const MALFORMED_INPUT = 'MALFORMED_INPUT';

/** 400 for anything that fails to parse before reaching the domain */
export function malformedInput(
  message: string | string[],
  details?: ValidationError[],
): BadRequestException {
  const body: HttpExceptionResponse = {
    statusCode: 400,
    message,
    error: MALFORMED_INPUT,
    timestamp: new Date().toISOString(),
    details,
  };
  return new BadRequestException(body);
}

// Nested DTO errors carry their constraints on the children.
function flatten(errors: ClassValidationError[], prefix = ''): ValidationError[] {
  return errors.flatMap((error) => {
    const property = prefix ? `${prefix}.${error.property}` : error.property;
    const own: ValidationError[] = error.constraints
      ? [{ property, constraints: error.constraints }]
      : [];
    return [...own, ...flatten(error.children ?? [], property)];
  });
}

/**
 * Global pipe: strips unknown properties, converts payloads to DTO instances,
 * and reports every violated constraint under MALFORMED_INPUT.
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    transform: true,
    exceptionFactory: (errors) => {
      const details = flatten(errors);
      const messages = details.flatMap((detail) => Object.values(detail.constraints));
      return malformedInput(messages, details);
    },
  });
}
