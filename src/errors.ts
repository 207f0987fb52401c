import type { ValidationError } from './types';

export class ConfigError extends Error {
  readonly errors: ValidationError[];

  constructor(message: string, errors: ValidationError[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

export class DatabaseInitError extends Error {
  readonly exitCode: number;

  constructor(exitCode: number) {
    super(`Error initializing the database (exit code ${exitCode})`);
    this.name = 'DatabaseInitError';
    this.exitCode = exitCode;
  }
}
