import { ValidationPipe } from '@nestjs/common';

/**
 * Global DTO validation. Undeclared fields are stripped, not rejected.
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    transform: true,
  });
}
