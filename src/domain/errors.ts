export type LiftErrorCode = 'InvalidInput' | 'UnknownFormula' | 'InvalidRange';

export class LiftError extends Error {
  constructor(readonly code: LiftErrorCode, message: string) {
    super(message);
    this.name = 'LiftError';
  }
}

export class InvalidInputError extends LiftError {
  constructor(message: string) {
    super('InvalidInput', message);
    this.name = 'InvalidInputError';
  }
}

export class UnknownFormulaError extends LiftError {
  constructor(readonly formula: string) {
    super('UnknownFormula', `Unknown formula: ${formula}`);
    this.name = 'UnknownFormulaError';
  }
}

export class InvalidRangeError extends LiftError {
  constructor(message: string) {
    super('InvalidRange', message);
    this.name = 'InvalidRangeError';
  }
}

export function isLiftError(err: unknown): err is LiftError {
  return err instanceof LiftError;
}
