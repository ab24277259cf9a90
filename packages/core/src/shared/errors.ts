export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class InsufficientInputError extends Error {
  constructor(
    public readonly required: number,
    public readonly received: number,
  ) {
    super(`Need at least ${required} models for comparison, received ${received}`);
    this.name = 'InsufficientInputError';
  }
}

export class ModelLoadError extends Error {
  constructor(
    public readonly filePath: string,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(`Failed to load model from ${filePath}: ${message}`);
    this.name = 'ModelLoadError';
  }
}
