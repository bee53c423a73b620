import type { FieldIssue } from './types';

export class ReportParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class EmptyInputError extends ReportParseError {
  constructor() {
    super('Report is empty');
  }
}

export class MissingStationError extends ReportParseError {
  constructor(readonly token?: string) {
    super(token ? `Expected a 4-letter station id, found "${token}"` : 'Report has no station id');
  }
}

export class MissingTimeError extends ReportParseError {
  constructor(what: string, readonly token?: string) {
    super(token ? `Expected ${what}, found "${token}"` : `Report ends before ${what}`);
  }
}

export class MalformedTimeError extends ReportParseError {
  constructor(readonly token: string, reason: string) {
    super(`Malformed time group "${token}": ${reason}`);
  }
}

/**
 * A recognized field token that does not match its expected shape.
 * Never thrown out of a parser: it is turned into a {@link FieldIssue}
 * on the record and the field stays unset.
 */
export class MalformedFieldError extends ReportParseError {
  constructor(readonly field: string, readonly token: string, reason: string) {
    super(reason);
  }

  toIssue(): FieldIssue {
    return { field: this.field, token: this.token, message: this.message };
  }
}
