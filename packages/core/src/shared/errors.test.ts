import { describe, it, expect } from 'vitest';
import { InsufficientInputError, ModelLoadError, ValidationError } from './errors.js';

describe('errors', () => {
  it('should carry the invalid field on ValidationError', () => {
    const error = new ValidationError('Invalid model', '/name', { errors: [] });
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ValidationError');
    expect(error.field).toBe('/name');
    expect(error.details).toEqual({ errors: [] });
  });

  it('should describe the shortfall on InsufficientInputError', () => {
    const error = new InsufficientInputError(2, 1);
    expect(error.name).toBe('InsufficientInputError');
    expect(error.message).toBe('Need at least 2 models for comparison, received 1');
    expect(error.required).toBe(2);
    expect(error.received).toBe(1);
  });

  it('should name the file on ModelLoadError', () => {
    const cause = new SyntaxError('Unexpected end of JSON input');
    const error = new ModelLoadError('models/sales.json', cause.message, cause);
    expect(error.name).toBe('ModelLoadError');
    expect(error.message).toBe('Failed to load model from models/sales.json: Unexpected end of JSON input');
    expect(error.filePath).toBe('models/sales.json');
    expect(error.cause).toBe(cause);
  });
});
