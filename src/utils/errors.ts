export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;

  constructor(message: string, statusCode: number, isOperational = true, code = 'APP_ERROR') {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.code = code;

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, true, 'VALIDATION_ERROR');
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, true, 'NOT_FOUND');
  }
}

export class InternalServerError extends AppError {
  constructor(message = 'Internal server error') {
    super(message, 500, false, 'INTERNAL_ERROR');
  }
}

/**
 * A boundary geometry carries a type tag other than Polygon or MultiPolygon.
 * This is a problem with the loaded data, never a negative lookup.
 */
export class UnsupportedGeometryError extends AppError {
  public readonly geometryType: string;

  constructor(geometryType: string, context?: string) {
    super(
      `Unsupported geometry type: ${JSON.stringify(geometryType)}${context ? ` (${context})` : ''}`,
      500,
      false,
      'UNSUPPORTED_GEOMETRY'
    );
    this.geometryType = geometryType;
  }
}

/** Coordinates missing, wrong arity or a degenerate ring. */
export class MalformedFeatureError extends AppError {
  constructor(message: string) {
    super(message, 500, false, 'MALFORMED_FEATURE');
  }
}

export class DataIntegrityError extends AppError {
  constructor(message: string) {
    super(message, 500, false, 'DATA_INTEGRITY');
  }
}
