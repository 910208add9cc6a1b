import type { typeToFlattenedError, ZodError } from 'zod';

export interface ValidationProblem<T> {
  error: string;
  issues: typeToFlattenedError<T>;
}

export const toValidationProblem = <T>(err: ZodError<T>, error = 'Invalid payload'): ValidationProblem<T> => ({
  error,
  issues: err.flatten(),
});

export class PurchaseInputError extends Error {
  constructor(public readonly problem: ValidationProblem<unknown>) {
    super(problem.error);
    this.name = 'PurchaseInputError';
  }
}
