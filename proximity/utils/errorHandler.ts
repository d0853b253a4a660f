import type { Request, Response, NextFunction } from "express";
import { getLogger, serializeError } from "./logger.js";
import type { CoordinateField } from "../types/index.js";

/**
 * API Error class for standardized error handling
 */
export class APIError extends Error {
  public statusCode: number;
  public isOperational: boolean;
  public details: unknown;

  constructor(message: string, statusCode: number = 500, details: unknown = null) {
    super(message);
    this.name = 'APIError';
    this.statusCode = statusCode;
    this.details = details;
    this.isOperational = true;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A latitude or longitude is non-finite or outside its valid range.
 * Raised when a GeoPoint is constructed, never later.
 */
export class InvalidCoordinateError extends APIError {
  public readonly identifier: string | undefined;
  public readonly field: CoordinateField;
  public readonly value: unknown;

  constructor(field: CoordinateField, value: unknown, identifier?: string, row?: number) {
    const subject = identifier !== undefined ? `record "${identifier}"` : 'point';
    const position = row !== undefined ? ` (row ${row})` : '';
    super(
      `Invalid ${field} ${String(value)} for ${subject}${position}`,
      422,
      { identifier: identifier ?? null, field, value, row: row ?? null }
    );
    this.name = 'InvalidCoordinateError';
    this.identifier = identifier;
    this.field = field;
    this.value = value;
  }
}

/**
 * Nearest-antenna lookup attempted with zero candidate antennas
 */
export class NoAntennaDataError extends APIError {
  constructor(operator?: string, availableOperators: string[] = []) {
    const message = operator
      ? `No antennas found for operator "${operator}"`
      : 'No antenna data available for proximity evaluation';
    super(message, 422, { operator: operator ?? null, availableOperators });
    this.name = 'NoAntennaDataError';
  }
}

/**
 * Address could not be resolved, or the geocoder could not be reached
 */
export class GeocodingError extends APIError {
  constructor(message: string, statusCode: 404 | 502 = 404, details: unknown = null) {
    super(message, statusCode, details);
    this.name = 'GeocodingError';
  }
}

export function isAPIError(error: unknown): error is APIError {
  return error instanceof APIError;
}

/**
 * Error handler middleware
 */
export function errorHandler(error: Error, req: Request, res: Response, _next: NextFunction): void {
  if (isAPIError(error)) {
    if (error.statusCode >= 500) {
      getLogger().error({ err: serializeError(error), path: req.path }, error.message);
    }
    res.status(error.statusCode).json({
      error: {
        message: error.message,
        details: error.details,
        statusCode: error.statusCode
      }
    });
    return;
  }

  // body-parser reports malformed JSON with a 400 status on the error object
  const status = Reflect.get(error, 'status');
  if (status === 400) {
    res.status(400).json({
      error: {
        message: 'Malformed request body',
        details: error.message,
        statusCode: 400
      }
    });
    return;
  }

  getLogger().error({ err: serializeError(error), path: req.path }, 'Unexpected error');
  res.status(500).json({
    error: {
      message: 'Internal server error',
      details: error.message || 'An unexpected error occurred',
      statusCode: 500
    }
  });
}
