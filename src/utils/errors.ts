export type SpoilageErrorCode = 'UNKNOWN_PRODUCT' | 'INVALID_INPUT' | 'INVALID_READING';

export class SpoilageError extends Error {
  readonly code: SpoilageErrorCode;
  readonly statusCode: number;

  constructor(code: SpoilageErrorCode, message: string, statusCode: number) {
    super(message);
    this.name = 'SpoilageError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class UnknownProductError extends SpoilageError {
  readonly product: string;

  constructor(product: string) {
    super('UNKNOWN_PRODUCT', `Unknown product '${product}'`, 404);
    this.name = 'UnknownProductError';
    this.product = product;
  }
}

export class InvalidInputError extends SpoilageError {
  constructor(message: string) {
    super('INVALID_INPUT', message, 400);
    this.name = 'InvalidInputError';
  }
}

export class InvalidReadingError extends SpoilageError {
  readonly field: string;

  constructor(field: string, message: string) {
    super('INVALID_READING', message, 400);
    this.name = 'InvalidReadingError';
    this.field = field;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
