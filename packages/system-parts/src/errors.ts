export class SystemPartsError extends Error {
  readonly code: string;

  constructor(message: string, code = 'SYSTEM_PARTS_ERROR') {
    super(message);
    this.name = 'SystemPartsError';
    this.code = code;
  }
}

export class InvalidArgumentError extends SystemPartsError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}

export class SystemPartDecodeError extends SystemPartsError {
  readonly issues: unknown;

  constructor(message: string, issues: unknown) {
    super(message, 'PART_DECODE_FAILED');
    this.name = 'SystemPartDecodeError';
    this.issues = issues;
  }
}
