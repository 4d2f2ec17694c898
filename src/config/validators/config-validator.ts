export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

export abstract class BaseValidator<T> {
  public abstract validate(value: unknown, path: string): asserts value is T;

  protected assertObject(value: unknown, path: string): asserts value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new ConfigValidationError(
        `${path} must be an object, got ${value === null ? 'null' : Array.isArray(value) ? 'array' : typeof value}`,
      );
    }
  }

  protected assertString(
    value: unknown,
    path: string,
    options: { nonEmpty?: boolean } = {},
  ): asserts value is string {
    if (typeof value !== 'string') {
      throw new ConfigValidationError(
        `${path} must be a string, got ${typeof value} (value: ${String(value)})`,
      );
    }
    if (options.nonEmpty && value.trim() === '') {
      throw new ConfigValidationError(`${path} must not be empty`);
    }
  }

  protected assertInteger(
    value: unknown,
    path: string,
    min?: number,
    max?: number,
  ): asserts value is number {
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new ConfigValidationError(
        `${path} must be an integer, got ${typeof value} (value: ${String(value)})`,
      );
    }
    if (min !== undefined && value < min) {
      throw new ConfigValidationError(`${path} must be >= ${min}, got ${value}`);
    }
    if (max !== undefined && value > max) {
      throw new ConfigValidationError(`${path} must be <= ${max}, got ${value}`);
    }
  }
}
