export class InvalidRuleError extends Error {
  field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'InvalidRuleError';
    this.field = field;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidRuleError);
    }
  }
}

export class InvalidWindowError extends Error {
  windowStart: string;
  windowEnd: string;

  constructor(windowStart: string, windowEnd: string, message?: string) {
    super(message ?? `Window end ${windowEnd} precedes window start ${windowStart}`);
    this.name = 'InvalidWindowError';
    this.windowStart = windowStart;
    this.windowEnd = windowEnd;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidWindowError);
    }
  }
}
