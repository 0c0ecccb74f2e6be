interface ValidationResult<T> {
  ok: boolean;
  errors: string[];
  value?: T;
}

const buildErrorResult = <T>(errors: string[]): ValidationResult<T> => ({
  ok: false,
  errors,
});

const buildOkResult = <T>(value: T): ValidationResult<T> => ({
  ok: true,
  errors: [],
  value,
});

export { buildErrorResult, buildOkResult };
export type { ValidationResult };
